// services/cache/cacheEntry.ts
import { CacheEntrySchema } from '../../utils/validationSchemas';
import { ONE_HOUR } from '../../utils/constants';
import type { ICacheEntry, ICacheStats, IResearchRecord } from '../../types';

export type EntryState = 'valid' | 'expired' | 'corrupt';

export const ttlHoursToMs = (ttlHours: number): number => ttlHours * ONE_HOUR;

export const buildCacheEntry = (
    topic: string,
    researchType: string,
    record: IResearchRecord,
    cachedAt: Date
): ICacheEntry => ({
    topic,
    research_type: researchType,
    cached_at: cachedAt.toISOString(),
    data: record
});

/**
 * Parses a serialized entry. Anything that is not valid JSON in the entry
 * shape (including an unparseable cached_at) yields null.
 */
export const parseCacheEntry = (raw: string): ICacheEntry | null => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    const result = CacheEntrySchema.safeParse(parsed);
    return result.success ? result.data : null;
};

// Fresh iff now - cached_at < ttl
export const isFresh = (entry: ICacheEntry, now: Date, ttlMs: number): boolean =>
    now.getTime() - Date.parse(entry.cached_at) < ttlMs;

export const classifyEntry = (raw: string, now: Date, ttlMs: number): EntryState => {
    const entry = parseCacheEntry(raw);
    if (!entry) return 'corrupt';
    return isFresh(entry, now, ttlMs) ? 'valid' : 'expired';
};

export const emptyStats = (ttlHours: number): ICacheStats => ({
    total: 0,
    valid: 0,
    expired: 0,
    corrupt: 0,
    ttlHours
});
