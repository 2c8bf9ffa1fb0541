import Redis from 'ioredis';
import { DateRange, DayKey, dayStart, rangeWindow } from '../common/dates.js';
import { errorMessage, StoreError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StoreSettings } from '../config/types.js';
import { DailyAggregate } from '../aggregation/types.js';
import { ContentItem } from '../normalizer/types.js';
import { SentimentModel, SentimentScore } from '../scoring/types.js';
import { StoreKeys } from './keys.js';
import { PipelineStore, SurveyResponse } from './types.js';

const logger = createLogger('RedisPipelineStore');

function parseAll<T>(values: (string | null)[]): T[] {
  const rows: T[] = [];
  for (const value of values) {
    if (value !== null) rows.push(JSON.parse(value));
  }
  return rows;
}

/**
 * Redis-backed store. Values are JSON documents; range reads go through
 * sorted-set indexes scored by epoch milliseconds. An aggregate is a
 * single SET, so readers see either the old or the new document.
 */
export class RedisPipelineStore implements PipelineStore {
  private readonly keys: StoreKeys;

  constructor(private readonly redis: Redis, keyPrefix: string = 'sp:') {
    this.keys = new StoreKeys(keyPrefix);
  }

  public static connect(settings: StoreSettings): RedisPipelineStore {
    const redis = new Redis(settings.redisUrl, {
      commandTimeout: settings.commandTimeoutMs,
      maxRetriesPerRequest: 3,
      lazyConnect: false
    });
    redis.on('error', (error: Error) => {
      logger.error('Redis connection error', { error: error.message });
    });
    return new RedisPipelineStore(redis, settings.keyPrefix);
  }

  public async getItem(id: string): Promise<ContentItem | undefined> {
    const raw = await this.run('getItem', () => this.redis.get(this.keys.item(id)));
    return raw === null ? undefined : JSON.parse(raw);
  }

  public async putItem(item: ContentItem): Promise<void> {
    await this.run('putItem', async () => {
      await this.redis.set(this.keys.item(item.id), JSON.stringify(item));
      await this.redis.zadd(this.keys.itemIndex(item.titleId), Date.parse(item.createdAt), item.id);
    });
  }

  public async getItems(titleId: string, range: DateRange): Promise<ContentItem[]> {
    const { startMs, endMs } = rangeWindow(range);
    return this.run('getItems', async () => {
      const ids = await this.redis.zrangebyscore(this.keys.itemIndex(titleId), startMs, `(${endMs}`);
      if (ids.length === 0) return [];
      return parseAll<ContentItem>(await this.redis.mget(ids.map(id => this.keys.item(id))));
    });
  }

  public async getScore(itemId: string, model: SentimentModel): Promise<SentimentScore | undefined> {
    const raw = await this.run('getScore', () => this.redis.hget(this.keys.scores(itemId), model));
    return raw === null ? undefined : JSON.parse(raw);
  }

  public async putScore(score: SentimentScore): Promise<void> {
    await this.run('putScore', () => this.redis.hset(this.keys.scores(score.itemId), score.model, JSON.stringify(score)));
  }

  public async putResponse(response: SurveyResponse): Promise<boolean> {
    return this.run('putResponse', async () => {
      const stored = await this.redis.hsetnx(
        this.keys.responses(response.titleId),
        response.respondentId,
        JSON.stringify(response)
      );
      if (stored === 0) return false;
      await this.redis.zadd(
        this.keys.responseIndex(response.titleId),
        Date.parse(response.submittedAt),
        response.respondentId
      );
      return true;
    });
  }

  public async getResponses(titleId: string, range: DateRange): Promise<SurveyResponse[]> {
    const { startMs, endMs } = rangeWindow(range);
    return this.run('getResponses', async () => {
      const ids = await this.redis.zrangebyscore(this.keys.responseIndex(titleId), startMs, `(${endMs}`);
      if (ids.length === 0) return [];
      return parseAll<SurveyResponse>(await this.redis.hmget(this.keys.responses(titleId), ...ids));
    });
  }

  public async putAggregate(aggregate: DailyAggregate): Promise<void> {
    const { titleId, source, date } = aggregate;
    await this.run('putAggregate', async () => {
      await this.redis.set(this.keys.aggregate(titleId, source, date), JSON.stringify(aggregate));
      await this.redis.zadd(this.keys.aggregateIndex(titleId, source), dayStart(date), date);
    });
  }

  public async getAggregate(titleId: string, source: string, date: DayKey): Promise<DailyAggregate | undefined> {
    const raw = await this.run('getAggregate', () => this.redis.get(this.keys.aggregate(titleId, source, date)));
    return raw === null ? undefined : JSON.parse(raw);
  }

  public async getAggregates(titleId: string, source: string, range: DateRange): Promise<DailyAggregate[]> {
    return this.run('getAggregates', async () => {
      const days = await this.redis.zrangebyscore(
        this.keys.aggregateIndex(titleId, source),
        dayStart(range.from),
        dayStart(range.to)
      );
      if (days.length === 0) return [];
      return parseAll<DailyAggregate>(await this.redis.mget(days.map(day => this.keys.aggregate(titleId, source, day))));
    });
  }

  public async close(): Promise<void> {
    await this.redis.quit();
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      logger.error('Redis command failed', { operation, error: errorMessage(error) });
      throw new StoreError(`Store operation ${operation} failed: ${errorMessage(error)}`, { operation });
    }
  }
}
