export * from './queryService.js';
