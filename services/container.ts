// services/container.ts
import type { AppConfig } from '../utils/config';
import redisClient from '../utils/redisClient';
import { createCacheStore } from './cache';
import type { ICacheStore, IKeyValueClient } from './cache';
import { CompletionService } from './completionService';
import type { ICompletionService } from './completionService';
import { SearchService } from './searchService';
import type { ISearchService } from './searchService';
import { NewsApiProvider } from './news/NewsApiProvider';
import { GNewsProvider } from './news/GNewsProvider';
import { BraveSearchProvider } from './search/BraveSearchProvider';
import ResearchService from './researchService';
import ContentService from './contentService';

export interface AppServices {
  cacheStore: ICacheStore;
  researchService: ResearchService;
  contentService: ContentService;
}

// Any collaborator can be swapped, e.g. for in-process fakes in tests
export interface ServiceOverrides {
  cacheStore?: ICacheStore;
  completion?: ICompletionService;
  search?: ISearchService;
  redis?: IKeyValueClient;
}

export const createServices = (config: AppConfig, overrides: ServiceOverrides = {}): AppServices => {
  const cacheStore = overrides.cacheStore ?? createCacheStore(config.cache, overrides.redis ?? redisClient);

  const completion = overrides.completion ?? new CompletionService(config.completion);

  // NewsAPI first, GNews as the fallback
  const search = overrides.search ?? new SearchService(
    [new NewsApiProvider(config.keys.newsApi), new GNewsProvider(config.keys.gnews)],
    new BraveSearchProvider(config.keys.brave)
  );

  const researchService = new ResearchService({
    cache: cacheStore,
    search,
    completion,
    settings: {
      cacheEnabled: config.cache.enabled,
      maxSearchResults: config.research.maxSearchResults,
      daysBack: config.research.daysBack,
    },
  });

  const contentService = new ContentService(completion);

  return { cacheStore, researchService, contentService };
};
