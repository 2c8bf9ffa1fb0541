import axios, { AxiosInstance } from 'axios';
import Ajv, { JSONSchemaType } from 'ajv';
import { errorMessage, ScoringFailure } from '../../common/errors.js';
import { createLogger } from '../../common/logger.js';
import { InferenceBackend, LabelScore } from './types.js';

const logger = createLogger('HttpInferenceBackend');

export interface HttpInferenceConfig {
  endpoint: string;
  modelName: string;
  apiKey?: string;
  timeoutMs: number;
}

const labelScoreSchema: JSONSchemaType<LabelScore> = {
  type: 'object',
  properties: {
    label: { type: 'string' },
    score: { type: 'number', minimum: 0, maximum: 1 }
  },
  required: ['label', 'score']
};

const ajv = new Ajv();
const validateBatch = ajv.compile<LabelScore[][]>({ type: 'array', items: { type: 'array', items: labelScoreSchema } });
const validateSingle = ajv.compile<LabelScore[]>({ type: 'array', items: labelScoreSchema });

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Text-classification endpoint in the Hugging Face inference style:
 * POST { inputs: string[] } -> one label distribution per input.
 */
export class HttpInferenceBackend implements InferenceBackend {
  public readonly name: string;
  private readonly http: AxiosInstance;

  constructor(private readonly config: HttpInferenceConfig) {
    this.name = config.modelName;
    this.http = axios.create({
      baseURL: config.endpoint,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {})
      }
    });
  }

  /**
   * Warm the model with a throwaway request
   */
  public async load(): Promise<void> {
    logger.debug('Warming up inference endpoint', { endpoint: this.config.endpoint, model: this.name });
    await this.classify(['warm up']);
  }

  public async classify(texts: string[]): Promise<LabelScore[][]> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>('', {
        inputs: texts,
        parameters: { top_k: null },
        options: { wait_for_model: true }
      });
      data = response.data;
    } catch (error) {
      throw this.toFailure(error, texts.length);
    }

    if (validateBatch(data)) {
      return data;
    }
    // Single inputs sometimes come back as a flat distribution
    if (texts.length === 1 && validateSingle(data)) {
      return [data];
    }

    throw new ScoringFailure('transformer', 'malformed_response', 'Unexpected inference response shape', {
      errors: ajv.errorsText(validateBatch.errors)
    });
  }

  private toFailure(error: unknown, batchSize: number): ScoringFailure {
    if (axios.isAxiosError(error)) {
      const code = error.code ?? '';
      const reason = TIMEOUT_CODES.has(code) ? 'timeout' : 'inference';
      logger.warn('Inference request failed', {
        model: this.name,
        reason,
        status: error.response?.status,
        code,
        batchSize
      });
      return new ScoringFailure('transformer', reason, error.message, { status: error.response?.status, code });
    }
    return new ScoringFailure('transformer', 'inference', errorMessage(error), { batchSize });
  }
}
