import { beforeEach, describe, expect, it } from 'vitest';
import { RedisCacheStore } from '../services/cache/RedisCacheStore';
import { getCacheKey } from '../services/cache/cacheKey';
import { ONE_HOUR } from '../utils/constants';
import { InMemoryKeyValueClient, makeRecord } from './fakes';

const T0 = new Date('2025-01-15T10:00:00.000Z');

describe('RedisCacheStore', () => {
  let client: InMemoryKeyValueClient;
  let now: Date;
  let store: RedisCacheStore;

  beforeEach(() => {
    client = new InMemoryKeyValueClient();
    now = T0;
    store = new RedisCacheStore(client, { ttlHours: 24, now: () => now });
  });

  it('stores entries under the research-cache prefix', async () => {
    await store.set('Anthropic', 'company', makeRecord());
    expect([...client.data.keys()]).toEqual([`research-cache:${getCacheKey('anthropic', 'company')}`]);
  });

  it('round-trips a record case-insensitively', async () => {
    const record = makeRecord();
    await store.set('Anthropic', 'company', record);
    expect(await store.get('ANTHROPIC', 'Company')).toEqual(record);
  });

  it('expires at the ttl without deleting', async () => {
    await store.set('Anthropic', 'company', makeRecord());

    now = new Date(T0.getTime() + 24 * ONE_HOUR - 1);
    expect(await store.get('Anthropic', 'company')).not.toBeNull();

    now = new Date(T0.getTime() + 25 * ONE_HOUR);
    expect(await store.get('Anthropic', 'company')).toBeNull();
    expect(client.data.size).toBe(1);
    expect(await store.stats()).toEqual({ total: 1, valid: 0, expired: 1, corrupt: 0, ttlHours: 24 });
  });

  it('treats a corrupt value as a miss and counts it', async () => {
    client.data.set(`research-cache:${getCacheKey('broken', 'general')}`, '{oops');
    expect(await store.get('broken', 'general')).toBeNull();
    expect(await store.stats()).toEqual({ total: 1, valid: 0, expired: 0, corrupt: 1, ttlHours: 24 });
  });

  it('clears only prefixed keys', async () => {
    await store.set('one', 'general', makeRecord());
    await store.set('two', 'general', makeRecord());
    client.data.set('unrelated', 'value');

    expect(await store.clearAll()).toBe(2);
    expect([...client.data.keys()]).toEqual(['unrelated']);
    expect(await store.stats()).toEqual({ total: 0, valid: 0, expired: 0, corrupt: 0, ttlHours: 24 });
  });

  it('invalidates one entry', async () => {
    await store.set('one', 'general', makeRecord());
    expect(await store.invalidate('One', 'General')).toBe(true);
    expect(await store.invalidate('one', 'general')).toBe(false);
  });

  it('degrades to an empty cache while disconnected', async () => {
    await store.set('one', 'general', makeRecord());
    client.ready = false;

    expect(await store.get('one', 'general')).toBeNull();
    expect(await store.set('two', 'general', makeRecord())).toBe(false);
    expect(await store.invalidate('one', 'general')).toBe(false);
    expect(await store.clearAll()).toBe(0);
    expect(await store.stats()).toEqual({ total: 0, valid: 0, expired: 0, corrupt: 0, ttlHours: 24 });
    expect(client.data.size).toBe(1);
  });
});
