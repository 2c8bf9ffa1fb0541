/**
 * Title sentiment pipeline
 *
 * Collector records -> normalized items -> sentiment scores -> daily
 * aggregates per (title, source, day) -> survey/social alignment.
 */
export * from './common/dates.js';
export * from './common/errors.js';
export { createLogger, setLogLevel, Logger } from './common/logger.js';
export * from './config/types.js';
export { loadConfig, parseConfig, validateConfig, DEFAULT_CONFIG_PATH, DEFAULT_LEXICON_PATH } from './config/loader.js';
export * from './normalizer/index.js';
export * from './scoring/index.js';
export * from './store/index.js';
export * from './aggregation/index.js';
export * from './comparison/index.js';
export * from './pipeline/index.js';
export * from './dashboard/index.js';
