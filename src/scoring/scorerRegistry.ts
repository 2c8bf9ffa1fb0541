import { ConfigurationError } from '../common/errors.js';
import { PipelineConfig } from '../config/types.js';
import { LexiconScorer } from './lexicon/lexiconScorer.js';
import { HttpInferenceBackend } from './transformer/httpInferenceBackend.js';
import { TransformerScorer } from './transformer/transformerScorer.js';
import { InferenceBackend } from './transformer/types.js';
import { FALLBACK_MODEL, Scorer, SentimentModel } from './types.js';

/**
 * Scorers by model tag. The fallback model is always present.
 */
export class ScorerRegistry {
  private readonly scorers = new Map<SentimentModel, Scorer>();

  public register(scorer: Scorer): this {
    this.scorers.set(scorer.model, scorer);
    return this;
  }

  public has(model: SentimentModel): boolean {
    return this.scorers.has(model);
  }

  public get(model: SentimentModel): Scorer {
    const scorer = this.scorers.get(model);
    if (!scorer) {
      throw new ConfigurationError(`No scorer registered for model "${model}"`, { model });
    }
    return scorer;
  }

  public get fallback(): Scorer {
    return this.get(FALLBACK_MODEL);
  }

  public models(): SentimentModel[] {
    return Array.from(this.scorers.keys());
  }
}

export interface ScorerRegistryOptions {
  /** Inference backend to use instead of the HTTP endpoint */
  backend?: InferenceBackend;
  lexicon?: LexiconScorer;
}

export function createScorerRegistry(config: PipelineConfig, options: ScorerRegistryOptions = {}): ScorerRegistry {
  const registry = new ScorerRegistry().register(options.lexicon ?? LexiconScorer.fromFile(config.lexiconPath));

  const { transformer } = config;
  const backend =
    options.backend ??
    (transformer.endpoint
      ? new HttpInferenceBackend({
        endpoint: transformer.endpoint,
        modelName: transformer.modelName,
        apiKey: transformer.apiKey,
        timeoutMs: transformer.timeoutMs
      })
      : undefined);

  if (backend) {
    registry.register(
      new TransformerScorer(backend, { maxTokens: transformer.maxTokens, batchSize: transformer.batchSize })
    );
  }
  return registry;
}
