import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import { getFromDate } from './INewsProvider';
import type { INewsProvider, NewsQuery } from './INewsProvider';
import type { INewsSourceArticle } from '../../types';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { cleanText, normalizeUrl } from '../../utils/helpers';
import { CONSTANTS } from '../../utils/constants';

const GNEWS_URL = 'https://gnews.io/api/v4/search';

// Specific Schema for GNews Response
const GNewsArticleSchema = z.object({
    source: z.object({ name: z.string().nullable().optional() }).optional(),
    title: z.string().nullable().optional(),
    description: z.string().nullable().optional(),
    content: z.string().nullable().optional(),
    url: z.string().url(),
    publishedAt: z.string().nullable().optional()
});

const GNewsResponseSchema = z.object({
    totalArticles: z.number().optional(),
    articles: z.array(GNewsArticleSchema).optional()
});

export class GNewsProvider implements INewsProvider {
    name = 'GNews';

    constructor(private readonly apiKey: string | undefined, private readonly http: AxiosInstance = apiClient) {}

    isConfigured(): boolean {
        return Boolean(this.apiKey);
    }

    async searchArticles({ query, daysBack, maxResults }: NewsQuery): Promise<INewsSourceArticle[]> {
        const params = {
            q: query,
            lang: 'en',
            max: maxResults,
            from: getFromDate(daysBack),
            apikey: this.apiKey
        };

        const response = await this.http.get<unknown>(GNEWS_URL, {
            params,
            timeout: CONSTANTS.TIMEOUTS.SEARCH_API
        });
        return this.normalize(response.data);
    }

    private normalize(data: unknown): INewsSourceArticle[] {
        const result = GNewsResponseSchema.safeParse(data);

        if (!result.success) {
            logger.error(`[GNews] Schema Mismatch: ${JSON.stringify(result.error.format())}`);
            return [];
        }

        return (result.data.articles || []).map(a => ({
            source: { name: a.source?.name || 'GNews' },
            title: cleanText(a.title || ''),
            description: cleanText(a.description || a.content || ''),
            url: normalizeUrl(a.url),
            publishedAt: a.publishedAt || ''
        }));
    }
}
