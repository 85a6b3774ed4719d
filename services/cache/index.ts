// services/cache/index.ts
import logger from '../../utils/logger';
import type { ICacheStore, IKeyValueClient } from './ICacheStore';
import { FileCacheStore } from './FileCacheStore';
import { RedisCacheStore } from './RedisCacheStore';

export interface CacheStoreSettings {
    backend: 'file' | 'redis';
    dir: string;
    ttlHours: number;
}

export const createCacheStore = (settings: CacheStoreSettings, redis: IKeyValueClient): ICacheStore => {
    logger.info(`🗄️ Research cache: ${settings.backend} (TTL ${settings.ttlHours}h)`);
    if (settings.backend === 'redis') {
        return new RedisCacheStore(redis, { ttlHours: settings.ttlHours });
    }
    return new FileCacheStore(settings.dir, { ttlHours: settings.ttlHours });
};

export { getCacheKey } from './cacheKey';
export { FileCacheStore } from './FileCacheStore';
export { RedisCacheStore } from './RedisCacheStore';
export type { CacheStoreOptions, ICacheStore, IKeyValueClient } from './ICacheStore';
