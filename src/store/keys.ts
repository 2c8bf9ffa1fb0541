import { DayKey } from '../common/dates.js';

/**
 * Redis key layout
 *
 *   item:{id}                    JSON ContentItem
 *   items:{titleId}              zset of item ids by createdAt ms
 *   score:{itemId}               hash model -> JSON SentimentScore
 *   responses:{titleId}          hash respondentId -> JSON SurveyResponse
 *   responses:idx:{titleId}      zset of respondent ids by submittedAt ms
 *   agg:{titleId}:{source}:{day} JSON DailyAggregate
 *   aggs:{titleId}:{source}      zset of days by day start ms
 */
export class StoreKeys {
  constructor(private readonly prefix: string) {}

  public item(id: string): string {
    return `${this.prefix}item:${id}`;
  }

  public itemIndex(titleId: string): string {
    return `${this.prefix}items:${titleId}`;
  }

  public scores(itemId: string): string {
    return `${this.prefix}score:${itemId}`;
  }

  public responses(titleId: string): string {
    return `${this.prefix}responses:${titleId}`;
  }

  public responseIndex(titleId: string): string {
    return `${this.prefix}responses:idx:${titleId}`;
  }

  public aggregate(titleId: string, source: string, date: DayKey): string {
    return `${this.prefix}agg:${titleId}:${source}:${date}`;
  }

  public aggregateIndex(titleId: string, source: string): string {
    return `${this.prefix}aggs:${titleId}:${source}`;
  }
}
