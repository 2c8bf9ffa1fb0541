export interface LabelScore {
  label: string;
  score: number;
}

/**
 * Something that runs a sequence-classification model over texts and
 * returns, per text, the probability of every label.
 */
export interface InferenceBackend {
  readonly name: string;
  load(): Promise<void>;
  classify(texts: string[]): Promise<LabelScore[][]>;
}

export interface TransformerScorerOptions {
  /** Whitespace tokens kept per text; the rest is cut off */
  maxTokens: number;
  batchSize: number;
}
