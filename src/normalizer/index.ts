export { normalize, mergeContentItems, dedupeItems, cleanText } from './normalizer.js';
export { fingerprint } from './fingerprint.js';
export { TitleMatcher } from './titleMatcher.js';
export {
  RawContentRecord,
  ContentItem,
  IngestionRejection,
  RejectionReason,
  NormalizeResult,
  REJECTION_REASONS
} from './types.js';
