/**
 * Configuration loading
 *
 * YAML file -> ajv schema check -> defaults and environment overrides ->
 * semantic checks -> frozen PipelineConfig. Every failure is a
 * ConfigurationError; the pipeline refuses to start on one.
 */
import { readFileSync } from 'fs';
import path from 'path';
import Ajv from 'ajv';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../common/errors.js';
import { isSentimentModel, SentimentModel } from '../scoring/types.js';
import { configFileSchema } from './schema.js';
import {
  ConfigFile,
  LOW_CONFIDENCE_POLICIES,
  LowConfidencePolicy,
  PipelineConfig,
  SOCIAL_SOURCE,
  SURVEY_SOURCE,
  Title
} from './types.js';

export const DEFAULT_CONFIG_PATH = 'config/pipeline.yaml';

export const DEFAULT_LEXICON_PATH = path.resolve(__dirname, '../../data/lexicon.json');

type Env = Record<string, string | undefined>;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile(configFileSchema);

/**
 * Read and parse a YAML config file
 */
export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): PipelineConfig {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(error)}`, {
      path: configPath
    });
  }
  return parseConfig(raw, env);
}

/**
 * Build a PipelineConfig from an already parsed document
 */
export function parseConfig(raw: unknown, env: Env = {}): PipelineConfig {
  if (!validateConfigFile(raw)) {
    const errors = (validateConfigFile.errors ?? []).map(e => ({
      field: e.instancePath || 'config',
      message: e.message
    }));
    throw new ConfigurationError('Config does not match schema', { errors });
  }

  const config = resolveConfig(raw, env);
  validateConfig(config);
  return deepFreeze(config);
}

function resolveConfig(file: ConfigFile, env: Env): PipelineConfig {
  const transformer = file.transformer ?? {};
  const store = file.store ?? {};
  const concurrency = file.concurrency ?? {};

  return {
    trackedTitles: file.tracked_titles.map(toTitle),
    sentimentModel: toSentimentModel(env.SENTIMENT_MODEL || file.sentiment_model || 'lexicon'),
    positiveThreshold: file.positive_threshold ?? 0.05,
    negativeThreshold: file.negative_threshold ?? -0.05,
    confidenceFloor: file.confidence_floor ?? 0,
    lowConfidencePolicy: toLowConfidencePolicy(file.low_confidence_policy ?? 'count'),
    retentionDays: file.retention_days ?? 365,
    surveyScale: file.survey_scale ?? { min: 1, max: 5 },
    alignmentWindow: file.alignment_window ?? 7,
    platforms: file.platforms ?? ['twitter', 'reddit'],
    lexiconPath: file.lexicon_path ?? DEFAULT_LEXICON_PATH,
    transformer: {
      endpoint: env.TRANSFORMER_ENDPOINT || transformer.endpoint || '',
      modelName: transformer.model_name ?? 'distilbert-base-uncased-finetuned-sst-2-english',
      apiKey: env.TRANSFORMER_API_KEY || undefined,
      maxTokens: transformer.max_tokens ?? 512,
      batchSize: transformer.batch_size ?? 16,
      concurrency: transformer.concurrency ?? 2,
      timeoutMs: transformer.timeout_ms ?? 10000
    },
    concurrency: {
      lexicon: concurrency.lexicon ?? 4,
      store: concurrency.store ?? 8
    },
    store: {
      redisUrl: env.REDIS_URL || store.redis_url || 'redis://127.0.0.1:6379',
      keyPrefix: store.key_prefix ?? 'sp:',
      commandTimeoutMs: store.command_timeout_ms ?? 5000
    },
    logLevel: env.LOG_LEVEL || file.log_level || 'info'
  };
}

function toSentimentModel(value: string): SentimentModel {
  if (!isSentimentModel(value)) {
    throw new ConfigurationError(`Unknown sentiment model "${value}"`, { model: value });
  }
  return value;
}

function toLowConfidencePolicy(value: string): LowConfidencePolicy {
  const policy = LOW_CONFIDENCE_POLICIES.find(candidate => candidate === value);
  if (!policy) {
    throw new ConfigurationError(`Unknown low confidence policy "${value}"`);
  }
  return policy;
}

function toTitle(entry: ConfigFile['tracked_titles'][number]): Title {
  const keywords = [entry.name, ...(entry.keywords ?? [])]
    .map(keyword => keyword.trim())
    .filter(keyword => keyword.length > 0);
  return {
    id: entry.id,
    name: entry.name,
    keywords: Array.from(new Set(keywords.map(keyword => keyword.toLowerCase())))
  };
}

/**
 * Semantic checks the schema cannot express
 */
export function validateConfig(config: PipelineConfig): void {
  const { positiveThreshold, negativeThreshold } = config;
  if (Math.abs(positiveThreshold) > 1 || Math.abs(negativeThreshold) > 1) {
    throw new ConfigurationError('Polarity thresholds must lie within [-1, 1]', {
      positiveThreshold,
      negativeThreshold
    });
  }
  if (negativeThreshold >= positiveThreshold || negativeThreshold > 0 || positiveThreshold < 0) {
    throw new ConfigurationError('Polarity thresholds overlap or contradict each other', {
      positiveThreshold,
      negativeThreshold
    });
  }

  if (config.confidenceFloor < 0 || config.confidenceFloor > 1) {
    throw new ConfigurationError('confidence_floor must lie within [0, 1]', {
      confidenceFloor: config.confidenceFloor
    });
  }

  if (config.surveyScale.min >= config.surveyScale.max) {
    throw new ConfigurationError('survey_scale.min must be below survey_scale.max', {
      surveyScale: config.surveyScale
    });
  }

  if (config.alignmentWindow < 2) {
    throw new ConfigurationError('alignment_window must cover at least 2 days');
  }

  const ids = new Set<string>();
  for (const title of config.trackedTitles) {
    if (ids.has(title.id)) {
      throw new ConfigurationError(`Duplicate title id "${title.id}"`);
    }
    ids.add(title.id);
  }

  const reserved = config.platforms.filter(p => p === SOCIAL_SOURCE || p === SURVEY_SOURCE);
  if (reserved.length > 0) {
    throw new ConfigurationError(`Platform names ${reserved.join(', ')} are reserved`);
  }

  if (config.sentimentModel === 'transformer' && !config.transformer.endpoint) {
    throw new ConfigurationError('transformer.endpoint is required when sentiment_model is transformer');
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
