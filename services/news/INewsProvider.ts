import type { INewsSourceArticle } from '../../types';

export interface NewsQuery {
    query: string;
    daysBack: number;
    maxResults: number;
}

export interface INewsProvider {
    name: string;
    isConfigured(): boolean;
    // Rejects on transport or auth failure; SearchService decides what that means.
    searchArticles(params: NewsQuery): Promise<INewsSourceArticle[]>;
}

// Lower bound of the publication window as an ISO date-time
export const getFromDate = (daysBack: number, now: Date = new Date()): string =>
    new Date(now.getTime() - daysBack * 24 * 60 * 60 * 1000).toISOString();
