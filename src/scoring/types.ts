export const SENTIMENT_MODELS = ['lexicon', 'transformer'] as const;

export type SentimentModel = typeof SENTIMENT_MODELS[number];

/**
 * Model every other model falls back to. It never fails.
 */
export const FALLBACK_MODEL: SentimentModel = 'lexicon';

export function isSentimentModel(value: string): value is SentimentModel {
  return (SENTIMENT_MODELS as readonly string[]).includes(value);
}

export interface ScoreResult {
  polarity: number;    // -1.0 to 1.0
  confidence: number;  // 0-1, 1.0 for deterministic models
}

/**
 * One persisted score. At most one row lives per (itemId, model).
 */
export interface SentimentScore {
  itemId: string;
  model: SentimentModel;
  polarity: number;
  confidence: number;
  computedAt: string;
  /** Model that was requested when this score is a fallback substitute */
  fallbackFrom?: SentimentModel;
}

/**
 * Sentiment scoring strategy. Implementations are selected by their
 * `model` tag through the scorer registry.
 */
export interface Scorer {
  readonly model: SentimentModel;
  score(text: string): Promise<ScoreResult>;
  scoreBatch(texts: string[]): Promise<ScoreResult[]>;
}

export interface ScoreBatchOptions {
  /** Overwrite rows that already exist for the model */
  rescore?: boolean;
  signal?: AbortSignal;
}

export interface ScoringOutcome {
  scores: SentimentScore[];
  scoredByModel: Record<SentimentModel, number>;
  skipped: number;
  failures: number;
  deferred: string[];
  cancelled: boolean;
}

export function emptyModelCounts(): Record<SentimentModel, number> {
  return { lexicon: 0, transformer: 0 };
}
