export * from './runSummary.js';
export * from './survey.js';
export * from './pipeline.js';
