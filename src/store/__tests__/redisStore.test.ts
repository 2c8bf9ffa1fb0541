import Redis from 'ioredis';
import { StoreError } from '../../common/errors.js';
import { RedisPipelineStore } from '../redisStore.js';
import { contentItem, dailyAggregate } from '../../__tests__/helpers.js';

// In-process stand-in for the handful of commands the store issues
class MockRedis {
  public strings = new Map<string, string>();
  public hashes = new Map<string, Map<string, string>>();
  public zsets = new Map<string, Map<string, number>>();
  public failing = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.check();
    this.strings.set(key, value);
    return 'OK';
  }

  async mget(keys: string[]): Promise<(string | null)[]> {
    this.check();
    return keys.map(key => this.strings.get(key) ?? null);
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.check();
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    this.check();
    const hash = this.hash(key);
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    return added;
  }

  async hsetnx(key: string, field: string, value: string): Promise<number> {
    this.check();
    const hash = this.hash(key);
    if (hash.has(field)) return 0;
    hash.set(field, value);
    return 1;
  }

  async hmget(key: string, ...fields: string[]): Promise<(string | null)[]> {
    this.check();
    return fields.map(field => this.hashes.get(key)?.get(field) ?? null);
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    this.check();
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    this.zsets.set(key, zset);
    const added = zset.has(member) ? 0 : 1;
    zset.set(member, score);
    return added;
  }

  async zrangebyscore(key: string, min: number, max: number | string): Promise<string[]> {
    this.check();
    const exclusive = typeof max === 'string' && max.startsWith('(');
    const upper = typeof max === 'string' ? Number(max.replace('(', '')) : max;
    return Array.from(this.zsets.get(key)?.entries() ?? [])
      .filter(([, score]) => score >= min && (exclusive ? score < upper : score <= upper))
      .sort(([a, sa], [b, sb]) => sa - sb || a.localeCompare(b))
      .map(([member]) => member);
  }

  async quit(): Promise<'OK'> {
    return 'OK';
  }

  private hash(key: string): Map<string, string> {
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    this.hashes.set(key, hash);
    return hash;
  }

  private check(): void {
    if (this.failing) throw new Error('Command timed out');
  }
}

describe('RedisPipelineStore', () => {
  let redis: MockRedis;
  let store: RedisPipelineStore;

  beforeEach(() => {
    redis = new MockRedis();
    store = new RedisPipelineStore(redis as unknown as Redis, 'test:');
  });

  test('stores items as JSON under prefixed keys', async () => {
    const item = contentItem({ id: 'abc', engagement: 4 });
    await store.putItem(item);

    expect(redis.strings.get('test:item:abc')).toBe(JSON.stringify(item));
    expect(await store.getItem('abc')).toEqual(item);
    expect(await store.getItem('missing')).toBeUndefined();
  });

  test('range reads cover whole UTC days', async () => {
    await store.putItem(contentItem({ id: 'before', createdAt: '2024-01-04T23:59:59.999Z' }));
    await store.putItem(contentItem({ id: 'late', createdAt: '2024-01-05T22:00:00.000Z' }));
    await store.putItem(contentItem({ id: 'early', createdAt: '2024-01-05T01:00:00.000Z' }));
    await store.putItem(contentItem({ id: 'after', createdAt: '2024-01-06T00:00:00.000Z' }));

    const items = await store.getItems('wednesday', { from: '2024-01-05', to: '2024-01-05' });

    expect(items.map(item => item.id)).toEqual(['early', 'late']);
  });

  test('keeps one score per model', async () => {
    const base = { itemId: 'abc', confidence: 1, computedAt: '2024-01-10T00:00:00.000Z' };
    await store.putScore({ ...base, model: 'lexicon', polarity: 0.4 });
    await store.putScore({ ...base, model: 'transformer', polarity: 0.9, confidence: 0.9 });
    await store.putScore({ ...base, model: 'lexicon', polarity: 0.5 });

    expect(await store.getScore('abc', 'lexicon')).toEqual({ ...base, model: 'lexicon', polarity: 0.5 });
    expect((await store.getScore('abc', 'transformer'))?.polarity).toBe(0.9);
    expect(redis.hashes.get('test:score:abc')?.size).toBe(2);
  });

  test('survey responses are put-if-absent', async () => {
    const response = {
      respondentId: 'r1',
      titleId: 'wednesday',
      satisfaction: 4,
      submittedAt: '2024-01-05T10:00:00.000Z'
    };

    expect(await store.putResponse(response)).toBe(true);
    expect(await store.putResponse({ ...response, satisfaction: 1 })).toBe(false);
    expect(await store.getResponses('wednesday', { from: '2024-01-05', to: '2024-01-05' })).toEqual([response]);
    expect(await store.getResponses('wednesday', { from: '2024-01-06', to: '2024-01-06' })).toEqual([]);
  });

  test('aggregates are replaced wholesale and listed by day', async () => {
    await store.putAggregate(dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-06', count: 2 }));
    await store.putAggregate(dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-05', count: 1 }));
    await store.putAggregate(dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-05', count: 7 }));

    expect((await store.getAggregate('wednesday', 'social', '2024-01-05'))?.count).toBe(7);
    const listed = await store.getAggregates('wednesday', 'social', { from: '2024-01-01', to: '2024-01-06' });
    expect(listed.map(a => [a.date, a.count])).toEqual([['2024-01-05', 7], ['2024-01-06', 2]]);
    expect(await store.getAggregates('wednesday', 'survey', { from: '2024-01-01', to: '2024-01-06' })).toEqual([]);
  });

  test('wraps command failures in StoreError', async () => {
    redis.failing = true;
    await expect(store.getItem('abc')).rejects.toThrow(StoreError);
  });
});
