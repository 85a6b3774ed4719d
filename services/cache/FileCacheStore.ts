// services/cache/FileCacheStore.ts
import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import logger from '../../utils/logger';
import { CONSTANTS } from '../../utils/constants';
import { getErrorMessage, hasErrorCode } from '../../utils/helpers';
import type { ICacheStats, IResearchRecord } from '../../types';
import type { CacheStoreOptions, ICacheStore } from './ICacheStore';
import { getCacheKey } from './cacheKey';
import {
    buildCacheEntry,
    classifyEntry,
    emptyStats,
    isFresh,
    parseCacheEntry,
    ttlHoursToMs
} from './cacheEntry';

const EXTENSION = CONSTANTS.CACHE.FILE_EXTENSION;

/**
 * One JSON file per key: <cacheDir>/<key>.json
 * Writes land in a temp file first and are renamed into place, so a reader
 * never sees a half-written entry. Concurrent writers: last rename wins.
 */
export class FileCacheStore implements ICacheStore {
    readonly name = 'file';
    private readonly ttlHours: number;
    private readonly ttlMs: number;
    private readonly now: () => Date;

    constructor(private readonly cacheDir: string, options: CacheStoreOptions) {
        this.ttlHours = options.ttlHours;
        this.ttlMs = ttlHoursToMs(options.ttlHours);
        this.now = options.now ?? (() => new Date());
    }

    private getCachePath(cacheKey: string): string {
        return path.join(this.cacheDir, `${cacheKey}${EXTENSION}`);
    }

    private async listEntryFiles(): Promise<string[]> {
        const files = await fs.readdir(this.cacheDir);
        return files.filter((file) => file.endsWith(EXTENSION));
    }

    async get(topic: string, researchType: string): Promise<IResearchRecord | null> {
        const cacheKey = getCacheKey(topic, researchType);

        let raw: string;
        try {
            raw = await fs.readFile(this.getCachePath(cacheKey), 'utf-8');
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                logger.warn(`Cache read error [${cacheKey}]: ${getErrorMessage(error)}`);
            }
            return null;
        }

        const entry = parseCacheEntry(raw);
        if (!entry) {
            logger.warn(`⚠️ Corrupt cache entry [${cacheKey}] for "${topic}". Treating as miss.`);
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
        const cachePath = this.getCachePath(getCacheKey(topic, researchType));
        const tmpPath = `${cachePath}.${process.pid}.${randomUUID()}.tmp`;

        try {
            await fs.mkdir(this.cacheDir, { recursive: true });
            const entry = buildCacheEntry(topic, researchType, record, this.now());
            await fs.writeFile(tmpPath, JSON.stringify(entry, null, 2), 'utf-8');
            await fs.rename(tmpPath, cachePath);
            logger.info(`💾 Cached research for: ${topic}`);
            return true;
        } catch (error) {
            logger.warn(`Cache write error for "${topic}": ${getErrorMessage(error)}`);
            await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
                logger.debug(`Temp cache file cleanup failed: ${getErrorMessage(cleanupError)}`);
            });
            return false;
        }
    }

    async invalidate(topic: string, researchType: string): Promise<boolean> {
        const cacheKey = getCacheKey(topic, researchType);
        try {
            await fs.unlink(this.getCachePath(cacheKey));
            logger.info(`🗑️ Invalidated cache for: ${topic}`);
            return true;
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                logger.warn(`Cache invalidation error for "${topic}": ${getErrorMessage(error)}`);
            }
            return false;
        }
    }

    async clearAll(): Promise<number> {
        let files: string[];
        try {
            files = await this.listEntryFiles();
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                logger.warn(`Cache clear error: ${getErrorMessage(error)}`);
            }
            return 0;
        }

        let count = 0;
        for (const file of files) {
            try {
                await fs.unlink(path.join(this.cacheDir, file));
                count++;
            } catch (error) {
                logger.warn(`Could not remove cache file ${file}: ${getErrorMessage(error)}`);
            }
        }

        logger.info(`🗑️ Cleared ${count} cache files`);
        return count;
    }

    async stats(): Promise<ICacheStats> {
        const stats = emptyStats(this.ttlHours);

        let files: string[];
        try {
            files = await this.listEntryFiles();
        } catch (error) {
            if (!hasErrorCode(error, 'ENOENT')) {
                logger.warn(`Cache stats error: ${getErrorMessage(error)}`);
            }
            return stats;
        }

        const now = this.now();
        for (const file of files) {
            let raw: string;
            try {
                raw = await fs.readFile(path.join(this.cacheDir, file), 'utf-8');
            } catch (error) {
                // Removed between listing and reading
                if (hasErrorCode(error, 'ENOENT')) continue;
                logger.debug(`Cache stats could not read ${file}: ${getErrorMessage(error)}`);
                stats.total++;
                stats.corrupt++;
                continue;
            }
            stats.total++;
            stats[classifyEntry(raw, now, this.ttlMs)]++;
        }

        return stats;
    }
}
