/**
 * Record handed over by a collector. `titleHint` is advisory only.
 */
export interface RawContentRecord {
  source: string;
  externalId?: string;
  titleHint?: string;
  text: string;
  author: string;
  createdAt: string | number;  // ISO-8601 or epoch ms
  engagement?: number;
}

/**
 * Canonical, deduplicated unit of text evidence
 */
export interface ContentItem {
  id: string;          // fingerprint
  source: string;
  titleId: string;
  text: string;
  author: string;
  createdAt: string;   // ISO-8601, UTC
  engagement?: number;
}

export type RejectionReason = 'malformed' | 'invalid_timestamp' | 'empty_text' | 'no_title_match';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'malformed',
  'invalid_timestamp',
  'empty_text',
  'no_title_match'
];

/**
 * A record that did not normalize. Returned, never thrown.
 */
export interface IngestionRejection {
  reason: RejectionReason;
  source?: string;
  detail?: string;
}

export type NormalizeResult =
  | { ok: true; item: ContentItem }
  | { ok: false; rejection: IngestionRejection };
