// services/cache/ICacheStore.ts
import type { ICacheStats, IResearchRecord } from '../../types';

/**
 * Keyed, time-stamped store for research records.
 *
 * Every operation resolves; none rejects. A store that is missing, unwritable
 * or holding corrupt data behaves like an empty cache (get -> null,
 * set -> false) so callers can treat caching as a pure optimization.
 */
export interface ICacheStore {
    readonly name: string;
    get(topic: string, researchType: string): Promise<IResearchRecord | null>;
    set(topic: string, researchType: string, record: IResearchRecord): Promise<boolean>;
    invalidate(topic: string, researchType: string): Promise<boolean>;
    clearAll(): Promise<number>;
    stats(): Promise<ICacheStats>;
}

export interface CacheStoreOptions {
    ttlHours: number;
    now?: () => Date;
}

/**
 * The slice of a key-value server the Redis-backed store needs.
 * Implementations swallow connection errors: get -> null, set -> false,
 * del -> 0, keys -> [].
 */
export interface IKeyValueClient {
    isReady(): boolean;
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<boolean>;
    del(key: string): Promise<number>;
    keys(pattern: string): Promise<string[]>;
}
