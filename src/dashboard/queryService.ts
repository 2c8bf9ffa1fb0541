import { assertRange, DateRange } from '../common/dates.js';
import { AggregationIntegrityError } from '../common/errors.js';
import { DailyAggregate } from '../aggregation/types.js';
import { Comparator } from '../comparison/comparator.js';
import { AlignmentReport } from '../comparison/types.js';
import { TitleMatcher } from '../normalizer/titleMatcher.js';
import { PipelineStore } from '../store/types.js';

/**
 * Roll-up of one source's aggregates over a range
 */
export interface SourceSummary {
  source: string;
  days: number;
  count: number;
  /** Daily means weighted by the rows in each; null when no row entered a mean */
  meanPolarity: number | null;
  positiveCount: number;
  neutralCount: number;
  negativeCount: number;
  meanSatisfaction: number | null;
  recommendationRate: number | null;
}

export interface TitleSummary {
  titleId: string;
  name: string;
  range: DateRange;
  sources: SourceSummary[];
}

function weightedMean(rows: { weight: number; value: number | null }[]): number | null {
  let total = 0;
  let weights = 0;
  for (const row of rows) {
    if (row.value === null || row.weight === 0) continue;
    total += row.value * row.weight;
    weights += row.weight;
  }
  return weights === 0 ? null : total / weights;
}

export function summarizeSource(source: string, aggregates: DailyAggregate[]): SourceSummary {
  const withRows = aggregates.filter(aggregate => aggregate.count > 0);
  return {
    source,
    days: withRows.length,
    count: withRows.reduce((sum, a) => sum + a.count, 0),
    meanPolarity: weightedMean(withRows.map(a => ({ weight: a.meanCount, value: a.meanPolarity }))),
    positiveCount: withRows.reduce((sum, a) => sum + a.positiveCount, 0),
    neutralCount: withRows.reduce((sum, a) => sum + a.neutralCount, 0),
    negativeCount: withRows.reduce((sum, a) => sum + a.negativeCount, 0),
    meanSatisfaction: weightedMean(withRows.map(a => ({ weight: a.count, value: a.meanSatisfaction }))),
    recommendationRate: weightedMean(withRows.map(a => ({ weight: a.count, value: a.recommendationRate })))
  };
}

/**
 * Read side for dashboards. Serves stored aggregates only; it never
 * triggers a recompute.
 */
export class QueryService {
  constructor(
    private readonly store: PipelineStore,
    private readonly titles: TitleMatcher,
    private readonly comparator: Comparator,
    private readonly sources: string[]
  ) {}

  public async getDailyAggregates(titleId: string, range: DateRange, source: string): Promise<DailyAggregate[]> {
    assertRange(range);
    return this.store.getAggregates(titleId, source, range);
  }

  public async getAlignmentReport(titleId: string, range: DateRange): Promise<AlignmentReport> {
    return this.comparator.compare(titleId, range);
  }

  public async getTitleSummary(titleId: string, range: DateRange): Promise<TitleSummary> {
    assertRange(range);
    const title = this.titles.get(titleId);
    if (!title) {
      throw new AggregationIntegrityError(`Unknown title "${titleId}"`, { titleId });
    }

    const sources = await Promise.all(
      this.sources.map(async source => summarizeSource(source, await this.store.getAggregates(titleId, source, range)))
    );
    return { titleId, name: title.name, range: { from: range.from, to: range.to }, sources };
  }
}
