import { errorMessage, ScoringFailure } from '../../common/errors.js';
import { createLogger } from '../../common/logger.js';
import { ScoreResult, Scorer } from '../types.js';
import { InferenceBackend, LabelScore, TransformerScorerOptions } from './types.js';

const logger = createLogger('TransformerScorer');

/**
 * Classifier labels mapped to the sign of the polarity they imply
 */
const LABEL_SIGNS: Record<string, 1 | 0 | -1> = {
  POSITIVE: 1,
  POS: 1,
  LABEL_1: 1,
  NEUTRAL: 0,
  NEU: 0,
  NEGATIVE: -1,
  NEG: -1,
  LABEL_0: -1
};

type ModelState = 'idle' | 'ready' | 'failed';

/**
 * Keep the first `maxTokens` whitespace tokens of a text
 */
export function truncateTokens(text: string, maxTokens: number): string {
  const tokens = text.split(/\s+/).filter(token => token.length > 0);
  return tokens.slice(0, maxTokens).join(' ');
}

/**
 * Argmax over the label distribution. Ties go to the label that sorts
 * first so the decision never depends on response order.
 */
export function decodeLabels(labels: LabelScore[]): ScoreResult {
  if (labels.length === 0) {
    throw new ScoringFailure('transformer', 'malformed_response', 'Empty label distribution');
  }

  const best = [...labels].sort((a, b) => b.score - a.score || a.label.localeCompare(b.label))[0];
  const sign = LABEL_SIGNS[best.label.toUpperCase()];
  if (sign === undefined) {
    throw new ScoringFailure('transformer', 'malformed_response', `Unknown label "${best.label}"`);
  }

  const confidence = Math.max(0, Math.min(1, best.score));
  return { polarity: sign * confidence, confidence };
}

/**
 * Transformer-based sentiment scorer
 * Holds a loaded sequence-classification model behind an inference
 * backend. Texts are truncated, batched and decoded greedily, so a given
 * text always scores the same.
 */
export class TransformerScorer implements Scorer {
  public readonly model = 'transformer' as const;
  private state: ModelState = 'idle';
  private loading?: Promise<void>;

  constructor(
    private readonly backend: InferenceBackend,
    private readonly options: TransformerScorerOptions
  ) {}

  public get isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Load the model once. A failed load is sticky for the scorer's
   * lifetime; every later call fails fast.
   */
  public async load(): Promise<void> {
    if (this.state === 'ready') return;
    if (this.state === 'failed') {
      throw new ScoringFailure('transformer', 'load', `Model ${this.backend.name} failed to load`);
    }

    if (!this.loading) {
      this.loading = this.backend.load().then(
        () => {
          this.state = 'ready';
          logger.info('Transformer model loaded', { backend: this.backend.name });
        },
        (error: unknown) => {
          this.state = 'failed';
          logger.error('Transformer model failed to load', {
            backend: this.backend.name,
            error: errorMessage(error)
          });
          // A timed-out warm-up is still a failed load
          throw new ScoringFailure('transformer', 'load', errorMessage(error), {
            cause: error instanceof ScoringFailure ? error.reason : undefined
          });
        }
      );
    }
    return this.loading;
  }

  public async score(text: string): Promise<ScoreResult> {
    const [result] = await this.scoreBatch([text]);
    return result;
  }

  public async scoreBatch(texts: string[]): Promise<ScoreResult[]> {
    await this.load();

    const results: ScoreResult[] = [];
    for (let start = 0; start < texts.length; start += this.options.batchSize) {
      const chunk = texts
        .slice(start, start + this.options.batchSize)
        .map(text => truncateTokens(text, this.options.maxTokens));
      results.push(...(await this.classifyChunk(chunk)));
    }
    return results;
  }

  private async classifyChunk(texts: string[]): Promise<ScoreResult[]> {
    let distributions: LabelScore[][];
    try {
      distributions = await this.backend.classify(texts);
    } catch (error) {
      if (error instanceof ScoringFailure) throw error;
      throw new ScoringFailure('transformer', 'inference', errorMessage(error), { batchSize: texts.length });
    }

    if (distributions.length !== texts.length) {
      throw new ScoringFailure(
        'transformer',
        'malformed_response',
        `Expected ${texts.length} results, got ${distributions.length}`
      );
    }
    return distributions.map(decodeLabels);
  }
}
