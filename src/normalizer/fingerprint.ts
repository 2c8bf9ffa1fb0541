import { createHash } from 'crypto';

export interface FingerprintInput {
  source: string;
  externalId?: string;
  author: string;
  text: string;
  createdAt: string;
}

/**
 * Deterministic content id. Platform ids win; without one the id is
 * derived from who said what, and when.
 */
export function fingerprint(input: FingerprintInput): string {
  const parts = input.externalId
    ? ['ext', input.source, input.externalId]
    : ['content', input.source, input.author, input.text, input.createdAt];
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}
