// services/contentService.ts
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { CONSTANTS } from '../utils/constants';
import { truncate } from '../utils/helpers';
import { buildPrompt, formatAngleLine } from '../utils/prompts';
import type { PromptName } from '../utils/prompts';
import type { ICompletionOptions } from '../types';
import type { ICompletionService } from './completionService';

const { CONTENT, COMPLETION, FALLBACKS } = CONSTANTS;

export enum PostStyle {
  NewsAnalysis = 'News Analysis',
  Educational = 'Educational Explainer',
  Opinion = 'Personal Opinion',
  Engagement = 'Engagement Question',
  Trend = 'Trend Prediction',
  Generic = 'Generic'
}

// Offered to callers in this order. Generic is what anything else resolves to.
export const POST_STYLE_LABELS: readonly string[] = [
  PostStyle.NewsAnalysis,
  PostStyle.Educational,
  PostStyle.Opinion,
  PostStyle.Engagement,
  PostStyle.Trend
];

const isNamedStyle = (label: string): label is PostStyle =>
  POST_STYLE_LABELS.includes(label);

export const resolvePostStyle = (label: string): PostStyle =>
  isNamedStyle(label) ? label : PostStyle.Generic;

interface StyleContext {
  topic: string;
  keyPoints: string;
  angle: string | undefined;
}

interface StyleStrategy {
  prompt: PromptName;
  // Undefined keeps the configured default
  temperature?: number;
  extra?: (ctx: StyleContext) => Record<string, string>;
}

const STYLE_STRATEGIES: Record<PostStyle, StyleStrategy> = {
  [PostStyle.NewsAnalysis]: { prompt: 'POST_NEWS_ANALYSIS', temperature: 0.7 },
  [PostStyle.Educational]: { prompt: 'POST_EDUCATIONAL', temperature: 0.7 },
  [PostStyle.Opinion]: {
    prompt: 'POST_OPINION',
    temperature: 0.8,
    extra: ({ topic }) => ({ stance: `This development in ${topic} is significant` })
  },
  [PostStyle.Engagement]: { prompt: 'POST_ENGAGEMENT', temperature: 0.7 },
  [PostStyle.Trend]: { prompt: 'POST_TREND', temperature: 0.8 },
  [PostStyle.Generic]: {
    prompt: 'POST_BASE',
    extra: () => ({ style: 'Informative' })
  }
};

export const buildFallbackPost = (topic: string, keyPoints: string): string =>
  `Interesting developments in ${topic} 🔍\n\n${keyPoints}\n\nWhat are your thoughts on this?\n\n#Technology #Innovation #Business`;

export const buildFallbackHashtags = (topic: string): string => {
  const words = topic.split(/\s+/).filter(Boolean).slice(0, 2);
  return `#${words.join('')} ${FALLBACKS.HASHTAG_SUFFIX}`;
};

const requireTopic = (topic: string): string => {
  const trimmed = topic.trim();
  if (!trimmed) {
    throw new AppError('Topic is required', 400);
  }
  return trimmed;
};

class ContentService {
  constructor(private readonly completion: ICompletionService) {}

  listStyles(): string[] {
    return [...POST_STYLE_LABELS];
  }

  /**
   * Styled post from a research summary. Never fails on completion errors:
   * each step has a fixed fallback.
   */
  async generate(topic: string, summary: string, style: string, angle?: string): Promise<string> {
    const cleanTopic = requireTopic(topic);
    const postStyle = resolvePostStyle(style);
    logger.info(`✍️ Generating "${postStyle}" post for: ${cleanTopic}`);

    const keyPoints = await this.extractKeyPoints(summary);
    const post = await this.generateByStyle(postStyle, { topic: cleanTopic, keyPoints, angle });
    return this.enhance(post, cleanTopic);
  }

  // Rewrites only the first line
  async improveHook(post: string, topic: string): Promise<string> {
    const cleanTopic = requireTopic(topic);
    const lines = post.split('\n');

    const result = await this.completion.complete(
      buildPrompt('IMPROVE_HOOK', { hook: lines[0], topic: cleanTopic }),
      { temperature: COMPLETION.HOOK_TEMPERATURE, maxTokens: COMPLETION.HOOK_MAX_TOKENS }
    );
    if (!result.ok) return post;

    lines[0] = result.value.trim();
    return lines.join('\n');
  }

  async regenerate(topic: string, summary: string, style: string, previousPost: string): Promise<string> {
    const cleanTopic = requireTopic(topic);
    logger.info(`🔁 Regenerating post for: ${cleanTopic}`);

    const result = await this.completion.complete(
      buildPrompt('REGENERATE', {
        previousPost,
        topic: cleanTopic,
        style,
        summary: truncate(summary, CONTENT.REGENERATE_INPUT_CHARS)
      }),
      { temperature: COMPLETION.REGENERATE_TEMPERATURE }
    );
    if (!result.ok) return previousPost;

    return this.enhance(result.value, cleanTopic);
  }

  // --- Private Helpers ---

  private async extractKeyPoints(summary: string): Promise<string> {
    const result = await this.completion.complete(
      buildPrompt('POST_KEY_POINTS', { summary: truncate(summary, CONTENT.KEY_POINTS_INPUT_CHARS) }),
      { maxTokens: COMPLETION.ANALYSIS_MAX_TOKENS }
    );
    return result.ok ? result.value : truncate(summary, CONTENT.KEY_POINTS_FALLBACK_CHARS);
  }

  private async generateByStyle(style: PostStyle, ctx: StyleContext): Promise<string> {
    const strategy = STYLE_STRATEGIES[style];
    const prompt = buildPrompt(strategy.prompt, {
      topic: ctx.topic,
      keyPoints: ctx.keyPoints,
      angle: formatAngleLine(ctx.angle),
      ...strategy.extra?.(ctx)
    });

    const options: ICompletionOptions = {};
    if (strategy.temperature !== undefined) {
      options.temperature = strategy.temperature;
    }

    const result = await this.completion.complete(prompt, options);
    return result.ok ? result.value : buildFallbackPost(ctx.topic, ctx.keyPoints);
  }

  private async enhance(post: string, topic: string): Promise<string> {
    let enhanced = post;
    if (!enhanced.includes('#')) {
      const hashtags = await this.suggestHashtags(enhanced, topic);
      enhanced = `${enhanced}\n\n${hashtags}`;
    }
    return enhanced.trim();
  }

  private async suggestHashtags(post: string, topic: string): Promise<string> {
    const result = await this.completion.complete(
      buildPrompt('HASHTAGS', { post: truncate(post, CONTENT.HASHTAG_INPUT_CHARS) }),
      { temperature: COMPLETION.HASHTAG_TEMPERATURE, maxTokens: COMPLETION.HASHTAG_MAX_TOKENS }
    );
    return result.ok ? result.value.trim() : buildFallbackHashtags(topic);
  }
}

export default ContentService;
