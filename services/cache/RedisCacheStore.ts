// services/cache/RedisCacheStore.ts
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import type { ICacheStats, IResearchRecord } from '../../types';
import type { CacheStoreOptions, ICacheStore, IKeyValueClient } from './ICacheStore';
import { getCacheKey } from './cacheKey';
import {
    buildCacheEntry,
    classifyEntry,
    emptyStats,
    isFresh,
    parseCacheEntry,
    ttlHoursToMs
} from './cacheEntry';

const PREFIX = CONSTANTS.CACHE.KEY_PREFIX;

/**
 * Redis-backed research cache.
 * Entries are stored without a Redis EX so that expired entries stay
 * visible to stats() until they are explicitly evicted, same as on disk.
 */
export class RedisCacheStore implements ICacheStore {
    readonly name = 'redis';
    private readonly ttlHours: number;
    private readonly ttlMs: number;
    private readonly now: () => Date;

    constructor(private readonly client: IKeyValueClient, options: CacheStoreOptions) {
        this.ttlHours = options.ttlHours;
        this.ttlMs = ttlHoursToMs(options.ttlHours);
        this.now = options.now ?? (() => new Date());
    }

    private getRedisKey(topic: string, researchType: string): string {
        return `${PREFIX}${getCacheKey(topic, researchType)}`;
    }

    async get(topic: string, researchType: string): Promise<IResearchRecord | null> {
        if (!this.client.isReady()) return null;

        const redisKey = this.getRedisKey(topic, researchType);
        const raw = await this.client.get(redisKey);
        if (raw === null) return null;

        const entry = parseCacheEntry(raw);
        if (!entry) {
            logger.warn(`⚠️ Corrupt cache entry [${redisKey}] for "${topic}". Treating as miss.`);
            return null;
        }

        if (!isFresh(entry, this.now(), this.ttlMs)) {
            logger.debug(`Cache EXPIRED: "${topic}" (cached at ${entry.cached_at})`);
            return null;
        }

        logger.debug(`Cache HIT: "${topic}" (cached at ${entry.cached_at})`);
        return entry.data;
    }

    async set(topic: string, researchType: string, record: IResearchRecord): Promise<boolean> {
        if (!this.client.isReady()) {
            logger.warn(`Redis not ready. Skipping cache write for "${topic}".`);
            return false;
        }

        const entry = buildCacheEntry(topic, researchType, record, this.now());
        const written = await this.client.set(this.getRedisKey(topic, researchType), JSON.stringify(entry));
        if (written) logger.info(`💾 Cached research for: ${topic}`);
        return written;
    }

    async invalidate(topic: string, researchType: string): Promise<boolean> {
        if (!this.client.isReady()) return false;

        const removed = await this.client.del(this.getRedisKey(topic, researchType));
        if (removed > 0) logger.info(`🗑️ Invalidated cache for: ${topic}`);
        return removed > 0;
    }

    async clearAll(): Promise<number> {
        if (!this.client.isReady()) return 0;

        let count = 0;
        for (const key of await this.client.keys(`${PREFIX}*`)) {
            count += await this.client.del(key);
        }

        logger.info(`🗑️ Cleared ${count} cache entries`);
        return count;
    }

    async stats(): Promise<ICacheStats> {
        const stats = emptyStats(this.ttlHours);
        if (!this.client.isReady()) return stats;

        const now = this.now();
        for (const key of await this.client.keys(`${PREFIX}*`)) {
            const raw = await this.client.get(key);
            // Deleted between KEYS and GET
            if (raw === null) continue;
            stats.total++;
            stats[classifyEntry(raw, now, this.ttlMs)]++;
        }

        return stats;
    }
}
