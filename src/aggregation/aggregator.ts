import Bottleneck from 'bottleneck';
import { addDays, assertRange, DateRange, DayKey, eachDay, isDayKey, toDayKey } from '../common/dates.js';
import { AggregationIntegrityError, errorMessage } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { PipelineConfig, SOCIAL_SOURCE, SURVEY_SOURCE } from '../config/types.js';
import { TitleMatcher } from '../normalizer/titleMatcher.js';
import { FALLBACK_MODEL } from '../scoring/types.js';
import { PipelineStore } from '../store/types.js';
import { computeAggregate, computeSurveyAggregate } from './statistics.js';
import {
  AggregateKey,
  AggregationFailure,
  AggregationOutcome,
  AggregationPolicy,
  DailyAggregate,
  PolarityRow
} from './types.js';

const logger = createLogger('Aggregator');

export interface AggregateRangeOptions {
  titles?: string[];
  sources?: string[];
  signal?: AbortSignal;
}

/**
 * Recomputes daily aggregates from stored rows. Work on one bucket is
 * serialized; distinct buckets run in parallel up to the store pool size.
 */
export class Aggregator {
  private readonly buckets = new Bottleneck.Group({ maxConcurrent: 1 });
  private readonly pool: Bottleneck;
  private readonly policy: AggregationPolicy;
  private readonly now: () => Date;

  constructor(
    private readonly store: PipelineStore,
    private readonly titles: TitleMatcher,
    private readonly config: PipelineConfig,
    now?: () => Date
  ) {
    this.pool = new Bottleneck({ maxConcurrent: config.concurrency.store });
    this.policy = {
      positiveThreshold: config.positiveThreshold,
      negativeThreshold: config.negativeThreshold,
      confidenceFloor: config.confidenceFloor,
      lowConfidencePolicy: config.lowConfidencePolicy
    };
    this.now = now ?? (() => new Date());
  }

  /**
   * Every source an aggregate is kept for
   */
  public get sources(): string[] {
    return [...this.config.platforms, SOCIAL_SOURCE, SURVEY_SOURCE];
  }

  public async aggregate(titleId: string, source: string, date: DayKey): Promise<DailyAggregate> {
    const key = { titleId, source, date };
    this.checkIntegrity(key);
    return this.enqueue(key, () => this.recompute(key));
  }

  public async aggregateRange(range: DateRange, options: AggregateRangeOptions = {}): Promise<AggregationOutcome> {
    assertRange(range);
    const titles = options.titles ?? this.titles.titles().map(title => title.id);
    const sources = options.sources ?? this.sources;

    const keys: AggregateKey[] = [];
    for (const date of eachDay(range)) {
      for (const titleId of titles) {
        for (const source of sources) keys.push({ titleId, source, date });
      }
    }

    const outcome: AggregationOutcome = { aggregates: [], failures: [], cancelled: false };
    await Promise.all(keys.map(async key => {
      try {
        this.checkIntegrity(key);
        // Read when the job starts so an abort also stops the buckets still queued
        const aggregate = await this.enqueue(key, async (): Promise<DailyAggregate | undefined> =>
          options.signal?.aborted ? undefined : this.recompute(key)
        );
        if (aggregate) {
          outcome.aggregates.push(aggregate);
        } else {
          outcome.cancelled = true;
        }
      } catch (error) {
        const failure: AggregationFailure = { ...key, error: errorMessage(error) };
        logger.warn('Skipping bucket', failure);
        outcome.failures.push(failure);
      }
    }));

    logger.info('Aggregated range', {
      from: range.from,
      to: range.to,
      recomputed: outcome.aggregates.length,
      failures: outcome.failures.length,
      cancelled: outcome.cancelled
    });
    return outcome;
  }

  /**
   * Serialize on the bucket key, then take a slot in the store pool
   */
  private enqueue<T>(key: AggregateKey, job: () => Promise<T>): Promise<T> {
    return this.buckets
      .key(`${key.titleId}|${key.source}|${key.date}`)
      .schedule(() => this.pool.schedule(job));
  }

  private checkIntegrity({ titleId, source, date }: AggregateKey): void {
    if (!this.titles.has(titleId)) {
      throw new AggregationIntegrityError(`Unknown title "${titleId}"`, { titleId, source, date });
    }
    if (!isDayKey(date)) {
      throw new AggregationIntegrityError(`Invalid date "${date}"`, { titleId, source, date });
    }
    const today = toDayKey(this.now());
    const earliest = addDays(today, -this.config.retentionDays);
    if (date < earliest || date > today) {
      throw new AggregationIntegrityError(`Date ${date} is outside retention window ${earliest}..${today}`, {
        titleId,
        source,
        date
      });
    }
  }

  private async recompute(key: AggregateKey): Promise<DailyAggregate> {
    const day = { from: key.date, to: key.date };
    const aggregate = key.source === SURVEY_SOURCE
      ? computeSurveyAggregate(key, await this.store.getResponses(key.titleId, day), this.policy, this.config.surveyScale)
      : computeAggregate(key, await this.socialRows(key), this.policy);

    await this.store.putAggregate(aggregate);
    logger.debug('Recomputed aggregate', { ...key, count: aggregate.count });
    return aggregate;
  }

  /**
   * One row per item that has a score from the configured model, or
   * failing that from the fallback model
   */
  private async socialRows({ titleId, source, date }: AggregateKey): Promise<PolarityRow[]> {
    const items = await this.store.getItems(titleId, { from: date, to: date });
    const model = this.config.sentimentModel;

    const scores = await Promise.all(
      items
        .filter(item => source === SOCIAL_SOURCE || item.source === source)
        .map(async item => {
          const score = await this.store.getScore(item.id, model);
          return score ?? (model !== FALLBACK_MODEL ? this.store.getScore(item.id, FALLBACK_MODEL) : undefined);
        })
    );

    const rows: PolarityRow[] = [];
    for (const score of scores) {
      if (!score) continue;
      rows.push({ id: score.itemId, polarity: score.polarity, confidence: score.confidence, model: score.model });
    }
    return rows;
  }
}
