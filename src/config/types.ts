import { SentimentModel } from '../scoring/types.js';

/**
 * A tracked title. `keywords` always includes the display name.
 */
export interface Title {
  readonly id: string;
  readonly name: string;
  readonly keywords: readonly string[];
}

/**
 * What happens to rows whose confidence is under the floor:
 * - count: left out of mean/stddev, still counted in count and buckets
 * - exclude: left out of the aggregate entirely
 */
export type LowConfidencePolicy = 'count' | 'exclude';

export const LOW_CONFIDENCE_POLICIES: readonly LowConfidencePolicy[] = ['count', 'exclude'];

export interface TransformerSettings {
  readonly endpoint: string;
  readonly modelName: string;
  readonly apiKey?: string;
  readonly maxTokens: number;
  readonly batchSize: number;
  readonly concurrency: number;
  readonly timeoutMs: number;
}

export interface StoreSettings {
  readonly redisUrl: string;
  readonly keyPrefix: string;
  readonly commandTimeoutMs: number;
}

export interface PipelineConfig {
  readonly trackedTitles: readonly Title[];
  readonly sentimentModel: SentimentModel;
  readonly positiveThreshold: number;
  readonly negativeThreshold: number;
  readonly confidenceFloor: number;
  readonly lowConfidencePolicy: LowConfidencePolicy;
  readonly retentionDays: number;
  readonly surveyScale: { readonly min: number; readonly max: number };
  readonly alignmentWindow: number;
  /** Social platform tags aggregated individually */
  readonly platforms: readonly string[];
  readonly lexiconPath: string;
  readonly transformer: TransformerSettings;
  readonly concurrency: { readonly lexicon: number; readonly store: number };
  readonly store: StoreSettings;
  readonly logLevel: string;
}

/**
 * On-disk shape (YAML, snake_case). Everything but the titles is optional.
 */
export interface ConfigFile {
  tracked_titles: { id: string; name: string; keywords?: string[] }[];
  sentiment_model?: string;
  positive_threshold?: number;
  negative_threshold?: number;
  confidence_floor?: number;
  low_confidence_policy?: string;
  retention_days?: number;
  survey_scale?: { min: number; max: number };
  alignment_window?: number;
  platforms?: string[];
  lexicon_path?: string;
  transformer?: {
    endpoint?: string;
    model_name?: string;
    max_tokens?: number;
    batch_size?: number;
    concurrency?: number;
    timeout_ms?: number;
  };
  concurrency?: { lexicon?: number; store?: number };
  store?: { redis_url?: string; key_prefix?: string; command_timeout_ms?: number };
  log_level?: string;
}

/** Source tags with a meaning of their own */
export const SOCIAL_SOURCE = 'social';
export const SURVEY_SOURCE = 'survey';
