import { addDays, assertRange, DateRange, DayKey, eachDay } from '../common/dates.js';
import { AggregationIntegrityError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { SOCIAL_SOURCE, SURVEY_SOURCE } from '../config/types.js';
import { DailyAggregate } from '../aggregation/types.js';
import { TitleMatcher } from '../normalizer/titleMatcher.js';
import { PipelineStore } from '../store/types.js';
import { pearson } from './correlation.js';
import { AlignmentDay, AlignmentReport, AlignmentStatus } from './types.js';

const logger = createLogger('Comparator');

/**
 * A side is present when at least one row entered its mean
 */
function present(aggregate: DailyAggregate | undefined): aggregate is DailyAggregate {
  return aggregate !== undefined && aggregate.meanCount > 0;
}

function statusOf(social: boolean, survey: boolean): AlignmentStatus {
  if (social && survey) return 'both';
  if (social) return 'social_only';
  if (survey) return 'survey_only';
  return 'none';
}

/**
 * Lines up the combined social aggregate against the survey aggregate per
 * day. A missing side is reported as missing, never as zero.
 */
export class Comparator {
  constructor(
    private readonly store: PipelineStore,
    private readonly titles: TitleMatcher,
    private readonly window: number
  ) {}

  public async compare(titleId: string, range: DateRange): Promise<AlignmentReport> {
    assertRange(range);
    if (!this.titles.has(titleId)) {
      throw new AggregationIntegrityError(`Unknown title "${titleId}"`, { titleId });
    }

    // Reach back far enough for the first day's rolling window
    const lookback = { from: addDays(range.from, -(this.window - 1)), to: range.to };
    const [social, survey] = await Promise.all([
      this.byDate(titleId, SOCIAL_SOURCE, lookback),
      this.byDate(titleId, SURVEY_SOURCE, lookback)
    ]);

    const pairs = new Map<DayKey, { social: number; survey: number }>();
    for (const date of eachDay(lookback)) {
      const s = social.get(date);
      const v = survey.get(date);
      if (present(s) && present(v)) {
        pairs.set(date, { social: s.meanPolarity, survey: v.meanPolarity });
      }
    }

    const days = eachDay(range).map(date => this.day(date, social.get(date), survey.get(date), pairs));
    const inRange = days.flatMap(day => {
      const pair = pairs.get(day.date);
      return pair ? [pair] : [];
    });
    const deltas = inRange.map(pair => Math.abs(pair.survey - pair.social));

    const report: AlignmentReport = {
      titleId,
      range: { from: range.from, to: range.to },
      window: this.window,
      days,
      pairedDays: inRange.length,
      overallCorrelation: pearson(inRange.map(p => p.social), inRange.map(p => p.survey)),
      meanAbsoluteDelta: deltas.length > 0 ? deltas.reduce((sum, d) => sum + d, 0) / deltas.length : null
    };

    logger.debug('Compared title', { titleId, from: range.from, to: range.to, pairedDays: report.pairedDays });
    return report;
  }

  private day(
    date: DayKey,
    social: DailyAggregate | undefined,
    survey: DailyAggregate | undefined,
    pairs: Map<DayKey, { social: number; survey: number }>
  ): AlignmentDay {
    const hasSocial = present(social);
    const hasSurvey = present(survey);
    const socialMean = hasSocial ? social.meanPolarity : null;
    const surveyNormalized = hasSurvey ? survey.meanPolarity : null;

    const windowPairs: { social: number; survey: number }[] = [];
    for (let offset = this.window - 1; offset >= 0; offset--) {
      const pair = pairs.get(addDays(date, -offset));
      if (pair) windowPairs.push(pair);
    }

    return {
      date,
      status: statusOf(hasSocial, hasSurvey),
      socialMean,
      surveyNormalized,
      delta: socialMean !== null && surveyNormalized !== null ? surveyNormalized - socialMean : null,
      rollingAlignment: pearson(windowPairs.map(p => p.social), windowPairs.map(p => p.survey)),
      socialCount: social?.count ?? 0,
      surveyCount: survey?.count ?? 0
    };
  }

  private async byDate(titleId: string, source: string, range: DateRange): Promise<Map<DayKey, DailyAggregate>> {
    const aggregates = await this.store.getAggregates(titleId, source, range);
    return new Map(aggregates.map(aggregate => [aggregate.date, aggregate]));
  }
}
