import { JSONSchemaType } from 'ajv';
import { ConfigFile } from './types.js';

const positiveInt = { type: 'integer', minimum: 1, nullable: true } as const;

export const configFileSchema: JSONSchemaType<ConfigFile> = {
  type: 'object',
  properties: {
    tracked_titles: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          name: { type: 'string', minLength: 1 },
          keywords: { type: 'array', items: { type: 'string' }, nullable: true }
        },
        required: ['id', 'name'],
        additionalProperties: false
      }
    },
    sentiment_model: { type: 'string', nullable: true },
    positive_threshold: { type: 'number', nullable: true },
    negative_threshold: { type: 'number', nullable: true },
    confidence_floor: { type: 'number', nullable: true },
    low_confidence_policy: { type: 'string', nullable: true },
    retention_days: positiveInt,
    survey_scale: {
      type: 'object',
      properties: {
        min: { type: 'number' },
        max: { type: 'number' }
      },
      required: ['min', 'max'],
      additionalProperties: false,
      nullable: true
    },
    alignment_window: positiveInt,
    platforms: { type: 'array', items: { type: 'string', minLength: 1 }, nullable: true },
    lexicon_path: { type: 'string', nullable: true },
    transformer: {
      type: 'object',
      properties: {
        endpoint: { type: 'string', nullable: true },
        model_name: { type: 'string', nullable: true },
        max_tokens: positiveInt,
        batch_size: positiveInt,
        concurrency: positiveInt,
        timeout_ms: positiveInt
      },
      required: [],
      additionalProperties: false,
      nullable: true
    },
    concurrency: {
      type: 'object',
      properties: {
        lexicon: positiveInt,
        store: positiveInt
      },
      required: [],
      additionalProperties: false,
      nullable: true
    },
    store: {
      type: 'object',
      properties: {
        redis_url: { type: 'string', nullable: true },
        key_prefix: { type: 'string', nullable: true },
        command_timeout_ms: positiveInt
      },
      required: [],
      additionalProperties: false,
      nullable: true
    },
    log_level: { type: 'string', nullable: true }
  },
  required: ['tracked_titles'],
  additionalProperties: false
};
