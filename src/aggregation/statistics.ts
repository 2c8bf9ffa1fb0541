import { emptyModelCounts } from '../scoring/types.js';
import { SurveyResponse } from '../store/types.js';
import { AggregateKey, AggregationPolicy, DailyAggregate, PolarityRow, Sentiment } from './types.js';

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
}

/**
 * Population standard deviation; 0 for fewer than two values
 */
export function populationStddev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - avg) ** 2;
  return Math.sqrt(squares / values.length);
}

export function classify(polarity: number, policy: Pick<AggregationPolicy, 'positiveThreshold' | 'negativeThreshold'>): Sentiment {
  if (polarity >= policy.positiveThreshold) return 'positive';
  if (polarity <= policy.negativeThreshold) return 'negative';
  return 'neutral';
}

/**
 * Map a satisfaction answer on [min, max] onto [-1, 1]
 */
export function rescaleSatisfaction(satisfaction: number, scale: { min: number; max: number }): number {
  const polarity = (2 * (satisfaction - scale.min)) / (scale.max - scale.min) - 1;
  return Math.max(-1, Math.min(1, polarity));
}

/**
 * Fold polarity rows into one aggregate. Rows are sorted by id first so
 * the floating-point result does not depend on read order.
 */
export function computeAggregate(key: AggregateKey, rows: PolarityRow[], policy: AggregationPolicy): DailyAggregate {
  const sorted = [...rows].sort((a, b) => a.id.localeCompare(b.id));
  const passesFloor = (row: PolarityRow) => row.confidence >= policy.confidenceFloor;

  const counted = policy.lowConfidencePolicy === 'exclude' ? sorted.filter(passesFloor) : sorted;
  const polarities = counted.filter(passesFloor).map(row => row.polarity);

  const aggregate: DailyAggregate = {
    titleId: key.titleId,
    source: key.source,
    date: key.date,
    count: counted.length,
    meanCount: polarities.length,
    meanPolarity: mean(polarities),
    stddevPolarity: populationStddev(polarities),
    positiveCount: 0,
    neutralCount: 0,
    negativeCount: 0,
    modelCounts: emptyModelCounts(),
    meanSatisfaction: null,
    recommendationRate: null,
    meanCompletionRate: null
  };

  for (const row of counted) {
    const sentiment = classify(row.polarity, policy);
    if (sentiment === 'positive') aggregate.positiveCount++;
    else if (sentiment === 'negative') aggregate.negativeCount++;
    else aggregate.neutralCount++;

    if (row.model) aggregate.modelCounts[row.model]++;
  }

  return aggregate;
}

/**
 * Survey aggregate: satisfaction rescaled to polarity, plus the raw
 * satisfaction, recommendation and completion roll-ups
 */
export function computeSurveyAggregate(
  key: AggregateKey,
  responses: SurveyResponse[],
  policy: AggregationPolicy,
  scale: { min: number; max: number }
): DailyAggregate {
  const sorted = [...responses].sort((a, b) => a.respondentId.localeCompare(b.respondentId));
  const rows = sorted.map(response => ({
    id: response.respondentId,
    polarity: rescaleSatisfaction(response.satisfaction, scale),
    confidence: 1
  }));
  const aggregate = computeAggregate(key, rows, policy);

  if (sorted.length > 0) {
    aggregate.meanSatisfaction = mean(sorted.map(r => r.satisfaction));
  }

  const recommendations: number[] = [];
  const completions: number[] = [];
  for (const response of sorted) {
    if (response.wouldRecommend !== undefined) recommendations.push(response.wouldRecommend ? 1 : 0);
    if (response.completionRate !== undefined) completions.push(response.completionRate);
  }
  if (recommendations.length > 0) aggregate.recommendationRate = mean(recommendations);
  if (completions.length > 0) aggregate.meanCompletionRate = mean(completions);

  return aggregate;
}
