import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import type { IWebSearchProvider } from './IWebSearchProvider';
import type { IWebResult } from '../../types';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { cleanText } from '../../utils/helpers';
import { CONSTANTS } from '../../utils/constants';

const BRAVE_SEARCH_API_URL = 'https://api.search.brave.com/res/v1/web/search';

const BraveResultSchema = z.object({
    title: z.string().nullable().optional(),
    url: z.string(),
    description: z.string().nullable().optional()
});

const BraveResponseSchema = z.object({
    web: z.object({
        results: z.array(BraveResultSchema).optional()
    }).optional()
});

export class BraveSearchProvider implements IWebSearchProvider {
    name = 'Brave';

    constructor(private readonly apiKey: string | undefined, private readonly http: AxiosInstance = apiClient) {}

    isConfigured(): boolean {
        return Boolean(this.apiKey);
    }

    async searchWeb(query: string, maxResults: number): Promise<IWebResult[]> {
        const response = await this.http.get<unknown>(BRAVE_SEARCH_API_URL, {
            params: { q: query, count: maxResults },
            headers: {
                Accept: 'application/json',
                'X-Subscription-Token': this.apiKey ?? ''
            },
            timeout: CONSTANTS.TIMEOUTS.SEARCH_API
        });
        return this.normalize(response.data).slice(0, maxResults);
    }

    private normalize(data: unknown): IWebResult[] {
        const result = BraveResponseSchema.safeParse(data);

        if (!result.success) {
            logger.error(`[Brave] Schema Mismatch: ${JSON.stringify(result.error.format())}`);
            return [];
        }

        return (result.data.web?.results || []).map(r => ({
            title: cleanText(r.title || ''),
            link: r.url,
            // Brave wraps matched terms in <strong>
            snippet: cleanText(r.description || '')
        }));
    }
}
