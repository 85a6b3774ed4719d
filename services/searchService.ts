// services/searchService.ts
import logger from '../utils/logger';
import { getErrorMessage } from '../utils/helpers';
import type { INewsSourceArticle, IWebResult } from '../types';
import type { INewsProvider } from './news/INewsProvider';
import type { IWebSearchProvider } from './search/IWebSearchProvider';

/**
 * Search never rejects: a provider error, timeout or schema mismatch yields [].
 */
export interface ISearchService {
  searchNews(query: string, daysBack: number, maxResults: number): Promise<INewsSourceArticle[]>;
  searchWeb(query: string, maxResults: number): Promise<IWebResult[]>;
}

export class SearchService implements ISearchService {
  constructor(
    private readonly newsProviders: INewsProvider[],
    private readonly webProvider: IWebSearchProvider
  ) {
    const names = newsProviders.filter((p) => p.isConfigured()).map((p) => p.name);
    logger.info(`📰 Search Service Initialized with [${names.join(', ') || 'no news providers'}]`);
  }

  /**
   * Providers are tried in order. The first one that returns articles wins;
   * an empty or failed answer moves on to the next configured provider.
   */
  async searchNews(query: string, daysBack: number, maxResults: number): Promise<INewsSourceArticle[]> {
    for (const provider of this.newsProviders) {
      if (!provider.isConfigured()) continue;

      try {
        const articles = await provider.searchArticles({ query, daysBack, maxResults });
        if (articles.length > 0) {
          logger.info(`✅ ${provider.name} returned ${articles.length} articles for "${query}"`);
          return this.dedupe(articles).slice(0, maxResults);
        }
        logger.warn(`${provider.name} returned 0 articles for "${query}".`);
      } catch (err) {
        logger.warn(`${provider.name} search failed: ${getErrorMessage(err)}`);
      }
    }

    logger.warn(`❌ No news articles found for "${query}".`);
    return [];
  }

  async searchWeb(query: string, maxResults: number): Promise<IWebResult[]> {
    if (!this.webProvider.isConfigured()) {
      logger.debug(`${this.webProvider.name} key not set. Skipping web search.`);
      return [];
    }

    try {
      return await this.webProvider.searchWeb(query, maxResults);
    } catch (err) {
      logger.warn(`${this.webProvider.name} web search failed: ${getErrorMessage(err)}`);
      return [];
    }
  }

  // Syndicated stories show up more than once under the same URL
  private dedupe(articles: INewsSourceArticle[]): INewsSourceArticle[] {
    const seen = new Set<string>();
    return articles.filter((article) => {
      if (seen.has(article.url)) return false;
      seen.add(article.url);
      return true;
    });
  }
}
