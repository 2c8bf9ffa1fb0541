import { DateRange, DayKey } from '../common/dates.js';
import { ContentItem } from '../normalizer/types.js';
import { SentimentModel, SentimentScore } from '../scoring/types.js';
import { DailyAggregate } from '../aggregation/types.js';

/**
 * One survey answer. Immutable once stored.
 */
export interface SurveyResponse {
  respondentId: string;
  titleId: string;
  satisfaction: number;
  submittedAt: string;       // ISO-8601, UTC
  wouldRecommend?: boolean;
  completionRate?: number;   // 0-1
}

/**
 * Persistence for items, scores, survey responses and aggregates.
 * Range reads are inclusive of both days and return rows in timestamp
 * order. Aggregate writes replace the whole value.
 */
export interface PipelineStore {
  getItem(id: string): Promise<ContentItem | undefined>;
  putItem(item: ContentItem): Promise<void>;
  getItems(titleId: string, range: DateRange): Promise<ContentItem[]>;

  getScore(itemId: string, model: SentimentModel): Promise<SentimentScore | undefined>;
  putScore(score: SentimentScore): Promise<void>;

  /** Put-if-absent keyed by title and respondent; false when already stored */
  putResponse(response: SurveyResponse): Promise<boolean>;
  getResponses(titleId: string, range: DateRange): Promise<SurveyResponse[]>;

  putAggregate(aggregate: DailyAggregate): Promise<void>;
  getAggregate(titleId: string, source: string, date: DayKey): Promise<DailyAggregate | undefined>;
  getAggregates(titleId: string, source: string, range: DateRange): Promise<DailyAggregate[]>;

  close(): Promise<void>;
}
