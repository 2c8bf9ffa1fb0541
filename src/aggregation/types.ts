import { DayKey } from '../common/dates.js';
import { LowConfidencePolicy } from '../config/types.js';
import { SentimentModel } from '../scoring/types.js';

/**
 * Cached per-(title, source, day) view. Replaced wholesale on recompute,
 * never patched.
 */
export interface DailyAggregate {
  titleId: string;
  source: string;
  date: DayKey;
  count: number;
  /** Rows that passed the confidence floor and entered the mean */
  meanCount: number;
  meanPolarity: number;
  stddevPolarity: number;
  positiveCount: number;
  neutralCount: number;
  negativeCount: number;
  modelCounts: Record<SentimentModel, number>;
  /** Survey sources only; null otherwise */
  meanSatisfaction: number | null;
  recommendationRate: number | null;
  meanCompletionRate: number | null;
}

export interface AggregationPolicy {
  positiveThreshold: number;
  negativeThreshold: number;
  confidenceFloor: number;
  lowConfidencePolicy: LowConfidencePolicy;
}

/**
 * One polarity observation feeding an aggregate
 */
export interface PolarityRow {
  id: string;
  polarity: number;
  confidence: number;
  model?: SentimentModel;
}

export type Sentiment = 'positive' | 'neutral' | 'negative';

export interface AggregateKey {
  titleId: string;
  source: string;
  date: DayKey;
}

export interface AggregationFailure extends AggregateKey {
  error: string;
}

export interface AggregationOutcome {
  aggregates: DailyAggregate[];
  failures: AggregationFailure[];
  cancelled: boolean;
}
