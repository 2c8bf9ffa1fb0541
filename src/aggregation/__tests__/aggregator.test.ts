import { AggregationIntegrityError } from '../../common/errors.js';
import { TitleMatcher } from '../../normalizer/titleMatcher.js';
import { SentimentModel } from '../../scoring/types.js';
import { MemoryPipelineStore } from '../../store/memoryStore.js';
import { Aggregator } from '../aggregator.js';
import { clock, contentItem, testConfig } from '../../__tests__/helpers.js';

async function scoreItem(
  store: MemoryPipelineStore,
  itemId: string,
  model: SentimentModel,
  polarity: number,
  confidence: number = 1
): Promise<void> {
  await store.putScore({ itemId, model, polarity, confidence, computedAt: '2024-01-10T00:00:00.000Z' });
}

describe('Aggregator', () => {
  let store: MemoryPipelineStore;

  beforeEach(async () => {
    store = new MemoryPipelineStore();
    await store.putItem(contentItem({ id: 'w-1', source: 'twitter', createdAt: '2024-01-05T08:00:00.000Z' }));
    await store.putItem(contentItem({ id: 'w-2', source: 'reddit', createdAt: '2024-01-05T13:00:00.000Z' }));
    await store.putItem(contentItem({ id: 'w-3', source: 'twitter', createdAt: '2024-01-05T23:59:59.999Z' }));
    await store.putItem(contentItem({ id: 'w-4', source: 'twitter', createdAt: '2024-01-06T00:00:00.000Z' }));
    await scoreItem(store, 'w-1', 'lexicon', 0.6);
    await scoreItem(store, 'w-2', 'lexicon', -0.2);
    await scoreItem(store, 'w-3', 'lexicon', 0.0);
    await scoreItem(store, 'w-4', 'lexicon', 0.9);
  });

  function aggregator(overrides: Record<string, unknown> = {}): Aggregator {
    const config = testConfig(overrides);
    return new Aggregator(store, new TitleMatcher(config.trackedTitles), config, clock);
  }

  test('computes the combined social bucket for a day', async () => {
    const aggregate = await aggregator().aggregate('wednesday', 'social', '2024-01-05');

    expect(aggregate.count).toBe(3);
    expect(aggregate.meanPolarity).toBeCloseTo(0.1333, 4);
    expect(aggregate.positiveCount).toBe(1);
    expect(aggregate.neutralCount).toBe(1);
    expect(aggregate.negativeCount).toBe(1);
    expect(await store.getAggregate('wednesday', 'social', '2024-01-05')).toEqual(aggregate);
  });

  test('a platform bucket only holds its own items', async () => {
    const aggregate = await aggregator().aggregate('wednesday', 'twitter', '2024-01-05');

    expect(aggregate.count).toBe(2);
    expect(aggregate.meanPolarity).toBeCloseTo(0.3, 12);
  });

  test('an empty day still yields a well-formed aggregate', async () => {
    const aggregate = await aggregator().aggregate('wednesday', 'social', '2024-01-07');

    expect(aggregate.count).toBe(0);
    expect(aggregate.meanPolarity).toBe(0);
    expect(aggregate.stddevPolarity).toBe(0);
    expect(aggregate.positiveCount + aggregate.neutralCount + aggregate.negativeCount).toBe(0);
  });

  test('prefers the configured model and falls back to the lexicon', async () => {
    await scoreItem(store, 'w-1', 'transformer', -0.9, 0.95);
    const agg = aggregator({ sentiment_model: 'transformer', transformer: { endpoint: 'http://inference.local' } });

    const aggregate = await agg.aggregate('wednesday', 'social', '2024-01-05');

    expect(aggregate.count).toBe(3);
    expect(aggregate.modelCounts).toEqual({ lexicon: 2, transformer: 1 });
    expect(aggregate.negativeCount).toBe(2);
  });

  test('unscored items are not rows', async () => {
    await store.putItem(contentItem({ id: 'w-5', createdAt: '2024-01-05T15:00:00.000Z' }));

    const aggregate = await aggregator().aggregate('wednesday', 'social', '2024-01-05');

    expect(aggregate.count).toBe(3);
  });

  test('rolls up survey responses', async () => {
    await store.putResponse({
      respondentId: 'r1',
      titleId: 'wednesday',
      satisfaction: 4,
      submittedAt: '2024-01-05T20:00:00.000Z'
    });

    const aggregate = await aggregator().aggregate('wednesday', 'survey', '2024-01-05');

    expect(aggregate.count).toBe(1);
    expect(aggregate.meanPolarity).toBe(0.5);
    expect(aggregate.meanSatisfaction).toBe(4);
  });

  test('concurrent recomputes of one bucket agree', async () => {
    const agg = aggregator();
    const results = await Promise.all(
      Array.from({ length: 5 }, () => agg.aggregate('wednesday', 'social', '2024-01-05'))
    );

    const stored = JSON.stringify(await store.getAggregate('wednesday', 'social', '2024-01-05'));
    for (const result of results) {
      expect(JSON.stringify(result)).toBe(stored);
    }
  });

  describe('integrity', () => {
    test('rejects an unknown title', async () => {
      await expect(aggregator().aggregate('ozark', 'social', '2024-01-05')).rejects.toThrow(AggregationIntegrityError);
    });

    test('rejects a future date', async () => {
      await expect(aggregator().aggregate('wednesday', 'social', '2024-01-11')).rejects.toThrow(
        AggregationIntegrityError
      );
    });

    test('rejects dates before the retention window', async () => {
      const agg = aggregator({ retention_days: 30 });

      await expect(agg.aggregate('wednesday', 'social', '2023-12-10')).rejects.toThrow(AggregationIntegrityError);
      await expect(agg.aggregate('wednesday', 'social', '2023-12-11')).resolves.toMatchObject({ count: 0 });
    });
  });

  describe('aggregateRange', () => {
    test('recomputes every source for every day and title', async () => {
      const outcome = await aggregator().aggregateRange(
        { from: '2024-01-05', to: '2024-01-06' },
        { titles: ['wednesday'] }
      );

      expect(outcome.failures).toEqual([]);
      expect(outcome.aggregates).toHaveLength(8);
      expect(await store.getAggregate('wednesday', 'twitter', '2024-01-06')).toMatchObject({ count: 1 });
    });

    test('skips and counts failing buckets', async () => {
      const outcome = await aggregator().aggregateRange(
        { from: '2024-01-05', to: '2024-01-05' },
        { titles: ['wednesday', 'ozark'] }
      );

      expect(outcome.aggregates).toHaveLength(4);
      expect(outcome.failures).toHaveLength(4);
      expect(outcome.failures.every(failure => failure.titleId === 'ozark')).toBe(true);
    });

    test('stops when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await aggregator().aggregateRange(
        { from: '2024-01-05', to: '2024-01-05' },
        { signal: controller.signal }
      );

      expect(outcome.cancelled).toBe(true);
      expect(outcome.aggregates).toEqual([]);
    });

    test('an abort mid-range stops the buckets still queued', async () => {
      const controller = new AbortController();
      const getItems = store.getItems.bind(store);
      const spy = jest.spyOn(store, 'getItems').mockImplementation((titleId, range) => {
        controller.abort();
        return getItems(titleId, range);
      });

      const outcome = await aggregator({ concurrency: { store: 1 } }).aggregateRange(
        { from: '2024-01-01', to: '2024-01-05' },
        { signal: controller.signal }
      );

      expect(outcome.cancelled).toBe(true);
      expect(spy).toHaveBeenCalledTimes(1);
      expect(outcome.failures).toEqual([]);
      expect(outcome.aggregates.length).toBeLessThan(60);
    });
  });
});
