export enum PipelineErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  SCORING_FAILURE = 'SCORING_FAILURE',
  AGGREGATION_INTEGRITY = 'AGGREGATION_INTEGRITY',
  STORE_FAILURE = 'STORE_FAILURE'
}

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Invalid or contradictory configuration. Fatal at startup.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(PipelineErrorCode.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export type ScoringFailureReason = 'load' | 'inference' | 'timeout' | 'malformed_response';

/**
 * A model failed to score one item or batch. Recovered by the scoring
 * service through lexicon fallback, or by deferral on timeout.
 */
export class ScoringFailure extends PipelineError {
  constructor(
    public readonly model: string,
    public readonly reason: ScoringFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(PipelineErrorCode.SCORING_FAILURE, message, { model, reason, ...details });
    this.name = 'ScoringFailure';
  }
}

/**
 * A bucket cannot be computed: unknown title or a date outside retention.
 */
export class AggregationIntegrityError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(PipelineErrorCode.AGGREGATION_INTEGRITY, message, details);
    this.name = 'AggregationIntegrityError';
  }
}

export class StoreError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(PipelineErrorCode.STORE_FAILURE, message, details);
    this.name = 'StoreError';
  }
}

/**
 * Extract a loggable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
