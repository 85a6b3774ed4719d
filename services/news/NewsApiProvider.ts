import { z } from 'zod';
import type { AxiosInstance } from 'axios';
import { getFromDate } from './INewsProvider';
import type { INewsProvider, NewsQuery } from './INewsProvider';
import type { INewsSourceArticle } from '../../types';
import apiClient from '../../utils/apiClient';
import logger from '../../utils/logger';
import { cleanText, normalizeUrl } from '../../utils/helpers';
import { CONSTANTS } from '../../utils/constants';

const NEWS_API_URL = 'https://newsapi.org/v2/everything';

// Specific Schema for NewsAPI Response
const NewsApiArticleSchema = z.object({
    source: z.object({ name: z.string().nullable().optional() }).optional(),
    title: z.string().nullable().optional(),
    description: z.string().nullable().optional(),
    content: z.string().nullable().optional(),
    url: z.string().url(),
    publishedAt: z.string().nullable().optional()
});

const NewsApiResponseSchema = z.object({
    status: z.string().optional(),
    totalResults: z.number().optional(),
    articles: z.array(NewsApiArticleSchema).optional()
});

export class NewsApiProvider implements INewsProvider {
    name = 'NewsAPI';

    constructor(private readonly apiKey: string | undefined, private readonly http: AxiosInstance = apiClient) {}

    isConfigured(): boolean {
        return Boolean(this.apiKey);
    }

    async searchArticles({ query, daysBack, maxResults }: NewsQuery): Promise<INewsSourceArticle[]> {
        const params = {
            q: query,
            from: getFromDate(daysBack),
            sortBy: 'relevancy',
            language: 'en',
            pageSize: maxResults,
            apiKey: this.apiKey
        };

        const response = await this.http.get<unknown>(NEWS_API_URL, {
            params,
            timeout: CONSTANTS.TIMEOUTS.SEARCH_API
        });
        return this.normalize(response.data);
    }

    private normalize(data: unknown): INewsSourceArticle[] {
        const result = NewsApiResponseSchema.safeParse(data);

        if (!result.success) {
            logger.error(`[NewsAPI] Schema Mismatch: ${JSON.stringify(result.error.format())}`);
            return [];
        }

        return (result.data.articles || [])
            // NewsAPI keeps placeholders for takedowns
            .filter(a => a.title !== '[Removed]')
            .map(a => ({
                source: { name: a.source?.name || 'NewsAPI' },
                title: cleanText(a.title || ''),
                description: cleanText(a.description || a.content || ''),
                url: normalizeUrl(a.url),
                publishedAt: a.publishedAt || ''
            }));
    }
}
