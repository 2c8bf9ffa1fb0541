import { AggregationIntegrityError } from '../../common/errors.js';
import { Comparator } from '../../comparison/comparator.js';
import { TitleMatcher } from '../../normalizer/titleMatcher.js';
import { MemoryPipelineStore } from '../../store/memoryStore.js';
import { QueryService, summarizeSource } from '../queryService.js';
import { dailyAggregate, testConfig } from '../../__tests__/helpers.js';

describe('summarizeSource', () => {
  test('weights daily means by count and skips empty days', () => {
    const summary = summarizeSource('social', [
      dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-01', count: 1, meanPolarity: 0.8, positiveCount: 1 }),
      dailyAggregate({
        titleId: 'wednesday',
        source: 'social',
        date: '2024-01-02',
        count: 3,
        meanPolarity: -0.4,
        negativeCount: 2,
        neutralCount: 1
      }),
      dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-03', count: 0, meanPolarity: 0 })
    ]);

    expect(summary).toEqual({
      source: 'social',
      days: 2,
      count: 4,
      meanPolarity: expect.closeTo(-0.1, 12),
      positiveCount: 1,
      neutralCount: 1,
      negativeCount: 2,
      meanSatisfaction: null,
      recommendationRate: null
    });
  });

  test('an empty source has no mean', () => {
    expect(summarizeSource('reddit', [])).toMatchObject({ days: 0, count: 0, meanPolarity: null });
  });

  test('weights by the rows that entered each daily mean', () => {
    const summary = summarizeSource('social', [
      dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-01', count: 4, meanCount: 1, meanPolarity: 0.6 }),
      dailyAggregate({ titleId: 'wednesday', source: 'social', date: '2024-01-02', count: 2, meanCount: 0, meanPolarity: 0 })
    ]);

    expect(summary.count).toBe(6);
    expect(summary.days).toBe(2);
    expect(summary.meanPolarity).toBe(0.6);
  });
});

describe('QueryService', () => {
  const config = testConfig();
  const titles = new TitleMatcher(config.trackedTitles);
  const range = { from: '2024-01-01', to: '2024-01-02' };
  let store: MemoryPipelineStore;
  let service: QueryService;

  beforeEach(async () => {
    store = new MemoryPipelineStore();
    service = new QueryService(store, titles, new Comparator(store, titles, config.alignmentWindow), [
      'twitter',
      'social',
      'survey'
    ]);
    await store.putAggregate(
      dailyAggregate({
        titleId: 'wednesday',
        source: 'survey',
        date: '2024-01-01',
        count: 2,
        meanPolarity: 0.5,
        positiveCount: 2,
        meanSatisfaction: 4,
        recommendationRate: 1
      })
    );
    await store.putAggregate(
      dailyAggregate({
        titleId: 'wednesday',
        source: 'survey',
        date: '2024-01-02',
        count: 6,
        meanPolarity: 0,
        neutralCount: 6,
        meanSatisfaction: 3,
        recommendationRate: 0.5
      })
    );
  });

  test('returns stored daily aggregates for a source', async () => {
    const aggregates = await service.getDailyAggregates('wednesday', range, 'survey');
    expect(aggregates.map(a => a.date)).toEqual(['2024-01-01', '2024-01-02']);
  });

  test('summarizes every source of a title', async () => {
    const summary = await service.getTitleSummary('wednesday', range);

    expect(summary.name).toBe('Wednesday');
    expect(summary.sources.map(s => s.source)).toEqual(['twitter', 'social', 'survey']);
    const survey = summary.sources[2];
    expect(survey.count).toBe(8);
    expect(survey.meanPolarity).toBeCloseTo(0.125, 12);
    expect(survey.meanSatisfaction).toBeCloseTo(3.25, 12);
    expect(survey.recommendationRate).toBeCloseTo(0.625, 12);
    expect(summary.sources[0]).toMatchObject({ days: 0, count: 0 });
  });

  test('serves alignment reports', async () => {
    const report = await service.getAlignmentReport('wednesday', range);
    expect(report.days.map(day => day.status)).toEqual(['survey_only', 'survey_only']);
  });

  test('rejects an unknown title', async () => {
    await expect(service.getTitleSummary('ozark', range)).rejects.toThrow(AggregationIntegrityError);
  });
});
