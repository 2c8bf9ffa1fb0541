export * from './types.js';
export * from './keys.js';
export * from './memoryStore.js';
export * from './redisStore.js';
