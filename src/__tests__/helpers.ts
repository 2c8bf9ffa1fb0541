import { DailyAggregate } from '../aggregation/types.js';
import { parseConfig } from '../config/loader.js';
import { PipelineConfig } from '../config/types.js';
import { ContentItem } from '../normalizer/types.js';
import { emptyModelCounts } from '../scoring/types.js';
import { InferenceBackend, LabelScore } from '../scoring/transformer/types.js';

export const NOW = new Date('2024-01-10T12:00:00.000Z');

export const clock = (): Date => NOW;

export const TEST_TITLES = [
  { id: 'wednesday', name: 'Wednesday', keywords: ['wednesday addams'] },
  { id: 'the-witcher', name: 'The Witcher', keywords: ['witcher', 'geralt'] },
  { id: 'stranger-things', name: 'Stranger Things' }
];

export function testConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return parseConfig({ tracked_titles: TEST_TITLES, platforms: ['twitter', 'reddit'], ...overrides });
}

export function contentItem(overrides: Partial<ContentItem> & { id: string }): ContentItem {
  return {
    source: 'twitter',
    titleId: 'wednesday',
    text: 'Wednesday is good',
    author: 'viewer',
    createdAt: '2024-01-05T12:00:00.000Z',
    ...overrides
  };
}

export function dailyAggregate(
  overrides: Partial<DailyAggregate> & Pick<DailyAggregate, 'titleId' | 'source' | 'date'>
): DailyAggregate {
  const count = overrides.count ?? 0;
  return {
    count,
    meanCount: count,
    meanPolarity: 0,
    stddevPolarity: 0,
    positiveCount: 0,
    neutralCount: 0,
    negativeCount: 0,
    modelCounts: emptyModelCounts(),
    meanSatisfaction: null,
    recommendationRate: null,
    meanCompletionRate: null,
    ...overrides
  };
}

/**
 * Inference backend that answers from a function and records its calls
 */
export class FakeInferenceBackend implements InferenceBackend {
  public readonly name = 'fake-classifier';
  public loads = 0;
  public calls: string[][] = [];

  constructor(
    private readonly respond: (texts: string[]) => Promise<LabelScore[][]> = async texts =>
      texts.map(() => [
        { label: 'POSITIVE', score: 0.9 },
        { label: 'NEGATIVE', score: 0.1 }
      ]),
    private readonly loadError?: Error
  ) {}

  public async load(): Promise<void> {
    this.loads++;
    if (this.loadError) {
      throw this.loadError;
    }
  }

  public async classify(texts: string[]): Promise<LabelScore[][]> {
    this.calls.push(texts);
    return this.respond(texts);
  }
}
