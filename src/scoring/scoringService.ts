import Bottleneck from 'bottleneck';
import { errorMessage, ScoringFailure } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { ContentItem } from '../normalizer/types.js';
import { PipelineStore } from '../store/types.js';
import { ScorerRegistry } from './scorerRegistry.js';
import {
  emptyModelCounts,
  FALLBACK_MODEL,
  ScoreBatchOptions,
  ScoreResult,
  ScoringOutcome,
  SentimentModel,
  SentimentScore
} from './types.js';

const logger = createLogger('ScoringService');

export interface ScoringServiceOptions {
  /** Concurrent jobs per model pool */
  concurrency: Record<SentimentModel, number>;
  /** Items per job, per model */
  chunkSize: Record<SentimentModel, number>;
  /** Job expiration per model; unset means no expiry */
  timeoutMs: Partial<Record<SentimentModel, number>>;
  storeConcurrency: number;
  now?: () => Date;
}

type ChunkResult =
  | { kind: 'scored'; scores: SentimentScore[]; failures: number }
  | { kind: 'deferred'; ids: string[] }
  | { kind: 'cancelled' };

function isTimeout(error: unknown): boolean {
  return (
    error instanceof Bottleneck.BottleneckError ||
    (error instanceof ScoringFailure && error.reason === 'timeout')
  );
}

/**
 * Runs scorers over content items through bounded pools and persists the
 * results. A failing model is replaced by the fallback model for the
 * affected chunk; a timed-out chunk is deferred to a later run.
 */
export class ScoringService {
  private readonly pools = new Map<SentimentModel, Bottleneck>();
  private readonly storePool: Bottleneck;
  private readonly now: () => Date;
  private stopped = false;

  constructor(
    private readonly store: PipelineStore,
    private readonly registry: ScorerRegistry,
    private readonly options: ScoringServiceOptions
  ) {
    for (const model of registry.models()) {
      this.pools.set(model, new Bottleneck({ maxConcurrent: options.concurrency[model] }));
    }
    this.storePool = new Bottleneck({ maxConcurrent: options.storeConcurrency });
    this.now = options.now ?? (() => new Date());
  }

  public async scoreBatch(
    items: ContentItem[],
    model: SentimentModel,
    options: ScoreBatchOptions = {}
  ): Promise<ScoringOutcome> {
    const outcome: ScoringOutcome = {
      scores: [],
      scoredByModel: emptyModelCounts(),
      skipped: 0,
      failures: 0,
      deferred: [],
      cancelled: false
    };
    const scorer = this.registry.get(model);
    const pool = this.pool(model);

    const { pending, unreadable } = options.rescore
      ? { pending: items, unreadable: [] }
      : await this.unscored(items, model);
    outcome.skipped = items.length - pending.length - unreadable.length;
    outcome.deferred.push(...unreadable);

    const chunks = this.chunk(pending, this.options.chunkSize[model]);
    const expiration = this.options.timeoutMs[model];

    const results = await Promise.all(chunks.map(chunk =>
      pool
        .schedule({ expiration }, async (): Promise<ChunkResult> => {
          if (options.signal?.aborted) return { kind: 'cancelled' };
          const results = await scorer.scoreBatch(chunk.map(item => item.text));
          return { kind: 'scored', scores: this.toScores(chunk, results, model), failures: 0 };
        })
        .catch((error: unknown) => this.recover(chunk, model, error))
    ));

    const computed: SentimentScore[] = [];
    for (const result of results) {
      if (result.kind === 'cancelled') {
        outcome.cancelled = true;
      } else if (result.kind === 'deferred') {
        outcome.deferred.push(...result.ids);
      } else {
        outcome.failures += result.failures;
        computed.push(...result.scores);
      }
    }

    // A score that could not be written is deferred to the next run
    const writes = await Promise.allSettled(
      computed.map(score => this.storePool.schedule(() => this.store.putScore(score)))
    );
    writes.forEach((write, index) => {
      const score = computed[index];
      if (write.status === 'fulfilled') {
        outcome.scores.push(score);
        outcome.scoredByModel[score.model]++;
      } else {
        logger.warn('Failed to store score, deferring item', {
          itemId: score.itemId,
          model: score.model,
          error: errorMessage(write.reason)
        });
        outcome.deferred.push(score.itemId);
      }
    });

    logger.info('Scored batch', {
      model,
      items: items.length,
      skipped: outcome.skipped,
      scored: outcome.scores.length,
      failures: outcome.failures,
      deferred: outcome.deferred.length,
      cancelled: outcome.cancelled
    });
    return outcome;
  }

  /**
   * Stop accepting jobs and wait for running ones
   */
  public async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await Promise.all([...this.pools.values(), this.storePool].map(pool => pool.stop({ dropWaitingJobs: false })));
  }

  private async recover(chunk: ContentItem[], model: SentimentModel, error: unknown): Promise<ChunkResult> {
    const ids = chunk.map(item => item.id);
    if (isTimeout(error)) {
      logger.warn('Scoring timed out, deferring items', { model, items: ids.length });
      return { kind: 'deferred', ids };
    }
    if (model === FALLBACK_MODEL) {
      throw error;
    }

    logger.warn('Scoring failed, falling back', {
      model,
      fallback: FALLBACK_MODEL,
      items: ids.length,
      reason: error instanceof ScoringFailure ? error.reason : 'inference',
      error: errorMessage(error)
    });
    const results = await this.registry.fallback.scoreBatch(chunk.map(item => item.text));
    return { kind: 'scored', scores: this.toScores(chunk, results, FALLBACK_MODEL, model), failures: chunk.length };
  }

  private toScores(
    chunk: ContentItem[],
    results: ScoreResult[],
    model: SentimentModel,
    fallbackFrom?: SentimentModel
  ): SentimentScore[] {
    const computedAt = this.now().toISOString();
    return chunk.map((item, index) => {
      const score: SentimentScore = {
        itemId: item.id,
        model,
        polarity: results[index].polarity,
        confidence: results[index].confidence,
        computedAt
      };
      if (fallbackFrom) {
        score.fallbackFrom = fallbackFrom;
      }
      return score;
    });
  }

  /**
   * Items without a score for the model. Items whose lookup failed are
   * returned separately and left for a later run.
   */
  private async unscored(
    items: ContentItem[],
    model: SentimentModel
  ): Promise<{ pending: ContentItem[]; unreadable: string[] }> {
    const lookups = await Promise.allSettled(
      items.map(item => this.storePool.schedule(() => this.store.getScore(item.id, model)))
    );

    const pending: ContentItem[] = [];
    const unreadable: string[] = [];
    lookups.forEach((lookup, index) => {
      const item = items[index];
      if (lookup.status === 'rejected') {
        logger.warn('Failed to read score, deferring item', {
          itemId: item.id,
          model,
          error: errorMessage(lookup.reason)
        });
        unreadable.push(item.id);
      } else if (lookup.value === undefined) {
        pending.push(item);
      }
    });
    return { pending, unreadable };
  }

  private chunk(items: ContentItem[], size: number): ContentItem[][] {
    const chunks: ContentItem[][] = [];
    for (let start = 0; start < items.length; start += size) {
      chunks.push(items.slice(start, start + size));
    }
    return chunks;
  }

  private pool(model: SentimentModel): Bottleneck {
    let pool = this.pools.get(model);
    if (!pool) {
      pool = new Bottleneck({ maxConcurrent: this.options.concurrency[model] });
      this.pools.set(model, pool);
    }
    return pool;
  }
}
