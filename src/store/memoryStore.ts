import { DateRange, DayKey, rangeWindow } from '../common/dates.js';
import { DailyAggregate } from '../aggregation/types.js';
import { ContentItem } from '../normalizer/types.js';
import { SentimentModel, SentimentScore } from '../scoring/types.js';
import { PipelineStore, SurveyResponse } from './types.js';

function snapshot<T extends object>(value: T): Readonly<T> {
  return Object.freeze(structuredClone(value));
}

function inWindow(timestamp: string, range: DateRange): boolean {
  const { startMs, endMs } = rangeWindow(range);
  const ms = Date.parse(timestamp);
  return ms >= startMs && ms < endMs;
}

function byTimestamp<T>(timestampOf: (row: T) => string, idOf: (row: T) => string) {
  return (a: T, b: T): number =>
    Date.parse(timestampOf(a)) - Date.parse(timestampOf(b)) || idOf(a).localeCompare(idOf(b));
}

/**
 * In-process store. Values are frozen copies, so callers never share
 * mutable state with the store.
 */
export class MemoryPipelineStore implements PipelineStore {
  private readonly items = new Map<string, Readonly<ContentItem>>();
  private readonly scores = new Map<string, Map<SentimentModel, Readonly<SentimentScore>>>();
  private readonly responses = new Map<string, Map<string, Readonly<SurveyResponse>>>();
  private readonly aggregates = new Map<string, Readonly<DailyAggregate>>();

  public async getItem(id: string): Promise<ContentItem | undefined> {
    return this.items.get(id);
  }

  public async putItem(item: ContentItem): Promise<void> {
    this.items.set(item.id, snapshot(item));
  }

  public async getItems(titleId: string, range: DateRange): Promise<ContentItem[]> {
    return Array.from(this.items.values())
      .filter(item => item.titleId === titleId && inWindow(item.createdAt, range))
      .sort(byTimestamp<ContentItem>(item => item.createdAt, item => item.id));
  }

  public async getScore(itemId: string, model: SentimentModel): Promise<SentimentScore | undefined> {
    return this.scores.get(itemId)?.get(model);
  }

  public async putScore(score: SentimentScore): Promise<void> {
    let byModel = this.scores.get(score.itemId);
    if (!byModel) {
      byModel = new Map();
      this.scores.set(score.itemId, byModel);
    }
    byModel.set(score.model, snapshot(score));
  }

  public async putResponse(response: SurveyResponse): Promise<boolean> {
    let byRespondent = this.responses.get(response.titleId);
    if (!byRespondent) {
      byRespondent = new Map();
      this.responses.set(response.titleId, byRespondent);
    }
    if (byRespondent.has(response.respondentId)) {
      return false;
    }
    byRespondent.set(response.respondentId, snapshot(response));
    return true;
  }

  public async getResponses(titleId: string, range: DateRange): Promise<SurveyResponse[]> {
    return Array.from(this.responses.get(titleId)?.values() ?? [])
      .filter(response => inWindow(response.submittedAt, range))
      .sort(byTimestamp<SurveyResponse>(r => r.submittedAt, r => r.respondentId));
  }

  public async putAggregate(aggregate: DailyAggregate): Promise<void> {
    this.aggregates.set(aggregateKey(aggregate.titleId, aggregate.source, aggregate.date), snapshot(aggregate));
  }

  public async getAggregate(titleId: string, source: string, date: DayKey): Promise<DailyAggregate | undefined> {
    return this.aggregates.get(aggregateKey(titleId, source, date));
  }

  public async getAggregates(titleId: string, source: string, range: DateRange): Promise<DailyAggregate[]> {
    return Array.from(this.aggregates.values())
      .filter(a => a.titleId === titleId && a.source === source && a.date >= range.from && a.date <= range.to)
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  public async close(): Promise<void> {
    // nothing to release
  }
}

function aggregateKey(titleId: string, source: string, date: DayKey): string {
  return `${titleId}\u0000${source}\u0000${date}`;
}
