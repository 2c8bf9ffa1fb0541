import Bottleneck from 'bottleneck';
import { assertRange, DateRange } from '../common/dates.js';
import { errorMessage } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { PipelineConfig } from '../config/types.js';
import { Aggregator } from '../aggregation/aggregator.js';
import { AggregationOutcome } from '../aggregation/types.js';
import { Comparator } from '../comparison/comparator.js';
import { AlignmentReport } from '../comparison/types.js';
import { dedupeItems, mergeContentItems, normalize } from '../normalizer/normalizer.js';
import { TitleMatcher } from '../normalizer/titleMatcher.js';
import { ContentItem, RejectionReason } from '../normalizer/types.js';
import { ScorerRegistry } from '../scoring/scorerRegistry.js';
import { ScoringService } from '../scoring/scoringService.js';
import { emptyModelCounts, ScoringOutcome, SentimentModel } from '../scoring/types.js';
import { PipelineStore } from '../store/types.js';
import { createRunSummary, emptyRejectionCounts, RunSummary } from './runSummary.js';
import { normalizeSurveyResponse, SurveyRejectionReason } from './survey.js';

const logger = createLogger('SentimentPipeline');

/** Items written between cancellation checks */
const INGEST_CHUNK_SIZE = 500;

/** Items per lexicon scoring job */
const LEXICON_CHUNK_SIZE = 100;

export interface StageOptions {
  signal?: AbortSignal;
}

export interface IngestResult {
  ingested: number;
  merged: number;
  rejected: number;
  rejectedByReason: Record<RejectionReason, number>;
  /** Items whose store write failed; the next ingest of the batch retries them */
  failed: number;
  cancelled: boolean;
}

export interface SurveyIngestResult {
  stored: number;
  duplicates: number;
  rejected: number;
  rejectedByReason: Record<SurveyRejectionReason, number>;
  failed: number;
}

export interface ScoreStageOptions extends StageOptions {
  titles?: string[];
  model?: SentimentModel;
  rescore?: boolean;
}

export interface AggregateStageOptions extends StageOptions {
  titles?: string[];
}

export interface RunInput extends StageOptions {
  records?: unknown[];
  responses?: unknown[];
  range: DateRange;
}

export interface PipelineOptions {
  now?: () => Date;
}

/**
 * Batch pipeline: ingest -> score -> aggregate, with comparison on demand.
 * Each stage takes explicit input, is idempotent and can run on its own.
 */
export class SentimentPipeline {
  public readonly titles: TitleMatcher;
  public readonly scoring: ScoringService;
  public readonly aggregator: Aggregator;
  public readonly comparator: Comparator;
  private readonly storePool: Bottleneck;
  private readonly now: () => Date;

  constructor(
    private readonly config: PipelineConfig,
    public readonly store: PipelineStore,
    registry: ScorerRegistry,
    options: PipelineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.titles = new TitleMatcher(config.trackedTitles);
    this.storePool = new Bottleneck({ maxConcurrent: config.concurrency.store });
    this.scoring = new ScoringService(store, registry, {
      concurrency: { lexicon: config.concurrency.lexicon, transformer: config.transformer.concurrency },
      chunkSize: { lexicon: LEXICON_CHUNK_SIZE, transformer: config.transformer.batchSize },
      timeoutMs: { transformer: config.transformer.timeoutMs },
      storeConcurrency: config.concurrency.store,
      now: this.now
    });
    this.aggregator = new Aggregator(store, this.titles, config, this.now);
    this.comparator = new Comparator(store, this.titles, config.alignmentWindow);
  }

  /**
   * Normalize collector records and persist the resulting items
   */
  public async ingest(records: unknown[], options: StageOptions = {}): Promise<IngestResult> {
    const result: IngestResult = {
      ingested: 0,
      merged: 0,
      rejected: 0,
      rejectedByReason: emptyRejectionCounts(),
      failed: 0,
      cancelled: false
    };

    const normalized: ContentItem[] = [];
    for (const record of records) {
      const outcome = normalize(record, this.titles);
      if (outcome.ok) {
        normalized.push(outcome.item);
      } else {
        result.rejected++;
        result.rejectedByReason[outcome.rejection.reason]++;
      }
    }

    const { items, merged } = dedupeItems(normalized);
    result.merged = merged;

    for (let start = 0; start < items.length; start += INGEST_CHUNK_SIZE) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        break;
      }
      const chunk = items.slice(start, start + INGEST_CHUNK_SIZE);
      const written = await Promise.allSettled(chunk.map(item => this.storePool.schedule(() => this.upsertItem(item))));
      written.forEach((write, index) => {
        if (write.status === 'rejected') {
          result.failed++;
          logger.warn('Failed to store item', { itemId: chunk[index].id, error: errorMessage(write.reason) });
        } else if (write.value) {
          result.merged++;
        } else {
          result.ingested++;
        }
      });
    }

    logger.info('Ingested records', {
      records: records.length,
      ingested: result.ingested,
      merged: result.merged,
      rejected: result.rejected,
      rejectedByReason: result.rejectedByReason,
      failed: result.failed
    });
    return result;
  }

  /**
   * Validate and store survey responses. Stored responses are never
   * replaced; a repeat is counted as a duplicate.
   */
  public async ingestSurvey(responses: unknown[], options: StageOptions = {}): Promise<SurveyIngestResult> {
    const result: SurveyIngestResult = {
      stored: 0,
      duplicates: 0,
      rejected: 0,
      rejectedByReason: { malformed: 0, invalid_timestamp: 0, unknown_title: 0, out_of_scale: 0 },
      failed: 0
    };

    for (const raw of responses) {
      if (options.signal?.aborted) break;
      const outcome = normalizeSurveyResponse(raw, this.titles, this.config.surveyScale);
      if (!outcome.ok) {
        result.rejected++;
        result.rejectedByReason[outcome.reason]++;
        continue;
      }
      try {
        if (await this.store.putResponse(outcome.response)) {
          result.stored++;
        } else {
          result.duplicates++;
        }
      } catch (error) {
        result.failed++;
        logger.warn('Failed to store survey response', {
          titleId: outcome.response.titleId,
          error: errorMessage(error)
        });
      }
    }

    logger.info('Ingested survey responses', { ...result });
    return result;
  }

  public async score(range: DateRange, options: ScoreStageOptions = {}): Promise<ScoringOutcome> {
    assertRange(range);
    const model = options.model ?? this.config.sentimentModel;
    const titles = options.titles ?? this.titles.titles().map(title => title.id);
    const total: ScoringOutcome = {
      scores: [],
      scoredByModel: emptyModelCounts(),
      skipped: 0,
      failures: 0,
      deferred: [],
      cancelled: false
    };

    for (const titleId of titles) {
      if (options.signal?.aborted) {
        total.cancelled = true;
        break;
      }
      const items = await this.store.getItems(titleId, range);
      if (items.length === 0) continue;

      const outcome = await this.scoring.scoreBatch(items, model, {
        rescore: options.rescore,
        signal: options.signal
      });
      total.scores.push(...outcome.scores);
      total.scoredByModel.lexicon += outcome.scoredByModel.lexicon;
      total.scoredByModel.transformer += outcome.scoredByModel.transformer;
      total.skipped += outcome.skipped;
      total.failures += outcome.failures;
      total.deferred.push(...outcome.deferred);
      total.cancelled = total.cancelled || outcome.cancelled;
    }
    return total;
  }

  public async aggregate(range: DateRange, options: AggregateStageOptions = {}): Promise<AggregationOutcome> {
    return this.aggregator.aggregateRange(range, { titles: options.titles, signal: options.signal });
  }

  public async compare(titleId: string, range: DateRange): Promise<AlignmentReport> {
    return this.comparator.compare(titleId, range);
  }

  /**
   * Every stage in order over one date range
   */
  public async run(input: RunInput): Promise<RunSummary> {
    assertRange(input.range);
    const summary = createRunSummary(this.now());
    const { signal } = input;
    logger.info('Pipeline run started', { runId: summary.runId, from: input.range.from, to: input.range.to });

    if (input.records) {
      const ingest = await this.ingest(input.records, { signal });
      summary.ingested = ingest.ingested;
      summary.merged = ingest.merged;
      summary.rejected = ingest.rejected;
      summary.rejectedByReason = ingest.rejectedByReason;
      summary.writeFailures += ingest.failed;
      summary.cancelled = ingest.cancelled;
    }

    if (input.responses) {
      const survey = await this.ingestSurvey(input.responses, { signal });
      summary.surveyStored = survey.stored;
      summary.surveyRejected = survey.rejected;
      summary.writeFailures += survey.failed;
    }

    if (!signal?.aborted) {
      const scoring = await this.score(input.range, { signal });
      summary.scoredByModel = scoring.scoredByModel;
      summary.skipped = scoring.skipped;
      summary.scoringFailures = scoring.failures;
      summary.deferred = scoring.deferred.length;
      summary.cancelled = summary.cancelled || scoring.cancelled;
    }

    if (!signal?.aborted) {
      const aggregation = await this.aggregate(input.range, { signal });
      summary.aggregatesRecomputed = aggregation.aggregates.length;
      summary.aggregationFailures = aggregation.failures.length;
      summary.cancelled = summary.cancelled || aggregation.cancelled;
    }

    summary.cancelled = summary.cancelled || signal?.aborted === true;
    summary.finishedAt = this.now().toISOString();
    logger.info('Pipeline run finished', { ...summary });
    return summary;
  }

  public async close(): Promise<void> {
    await this.scoring.stop();
    await this.store.close();
  }

  /**
   * Write an item, folding it onto a stored copy. Resolves true on merge.
   */
  private async upsertItem(item: ContentItem): Promise<boolean> {
    const existing = await this.store.getItem(item.id);
    await this.store.putItem(existing ? mergeContentItems(existing, item) : item);
    return existing !== undefined;
  }
}
