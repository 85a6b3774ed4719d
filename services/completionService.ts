// services/completionService.ts
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger';
import apiClient from '../utils/apiClient';
import { ConfigurationError } from '../utils/AppError';
import { CONSTANTS } from '../utils/constants';
import { getErrorMessage } from '../utils/helpers';
import { err, ok } from '../utils/result';
import type { Result } from '../utils/result';
import type { IChatMessage, ICompletionOptions } from '../types';

const SYSTEM_PROMPT = 'You are a helpful AI assistant.';

export type CompletionFailureReason = 'unauthenticated' | 'rate_limited' | 'unreachable' | 'empty' | 'failed';

export class CompletionError extends Error {
  constructor(public readonly reason: CompletionFailureReason, message: string) {
    super(message);
    this.name = 'CompletionError';
  }
}

export interface ICompletionService {
  /**
   * One attempt, no retries. Service-side failures come back as Err.
   * Throws ConfigurationError when no API key is configured.
   */
  complete(prompt: string, options?: ICompletionOptions): Promise<Result<string, CompletionError>>;
}

export interface CompletionSettings {
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

// Only the fields we read from an OpenAI-compatible response
const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional()
      })
    })
  )
});

export class CompletionService implements ICompletionService {
  private readonly endpoint: string;

  constructor(private readonly settings: CompletionSettings, private readonly http: AxiosInstance = apiClient) {
    this.endpoint = `${settings.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    if (!settings.apiKey) {
      logger.warn("⚠️ No OpenAI API Key found in config. Generation will fail until one is set.");
    }
    logger.info(`🤖 Completion Service Initialized (Model: ${settings.model})`);
  }

  async complete(prompt: string, options: ICompletionOptions = {}): Promise<Result<string, CompletionError>> {
    const { apiKey } = this.settings;
    if (!apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not configured. Add it to your environment or .env file.');
    }

    const messages: IChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: prompt }
    ];

    try {
      const response = await this.http.post<unknown>(this.endpoint, {
        model: this.settings.model,
        messages,
        temperature: options.temperature ?? this.settings.temperature,
        max_tokens: options.maxTokens ?? this.settings.maxTokens
      }, {
        headers: { Authorization: `Bearer ${apiKey}` },
        timeout: CONSTANTS.TIMEOUTS.COMPLETION_API
      });

      return this.parseResponse(response.data);
    } catch (error) {
      const failure = this.toCompletionError(error);
      logger.warn(`Completion failed (${failure.reason}): ${failure.message}`);
      return err(failure);
    }
  }

  // --- Private Helpers ---

  private parseResponse(data: unknown): Result<string, CompletionError> {
    const result = ChatCompletionResponseSchema.safeParse(data);
    if (!result.success) {
      return err(new CompletionError('empty', 'Completion response had an unexpected shape'));
    }

    const content = result.data.choices[0]?.message.content;
    if (!content || content.trim() === '') {
      return err(new CompletionError('empty', 'Completion service returned empty content'));
    }

    return ok(content);
  }

  private toCompletionError(error: unknown): CompletionError {
    if (!axios.isAxiosError(error)) {
      return new CompletionError('failed', getErrorMessage(error));
    }

    const status = error.response?.status;
    if (status === 401 || status === 403) {
      logger.error(`❌ Completion Auth Failed (${status}). Check OPENAI_API_KEY.`);
      return new CompletionError('unauthenticated', `HTTP ${status}`);
    }
    if (status === 429) {
      return new CompletionError('rate_limited', 'HTTP 429');
    }
    if (status === undefined) {
      // Timeout, DNS, refused connection
      return new CompletionError('unreachable', error.message);
    }
    return new CompletionError('failed', `HTTP ${status}`);
  }
}
