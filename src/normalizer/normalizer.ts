import Ajv from 'ajv';
import { parseTimestamp } from '../common/dates.js';
import { SOCIAL_SOURCE, SURVEY_SOURCE } from '../config/types.js';
import { fingerprint } from './fingerprint.js';
import { TitleMatcher } from './titleMatcher.js';
import { ContentItem, IngestionRejection, NormalizeResult, RawContentRecord } from './types.js';

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const rawContentSchema = {
  type: 'object',
  properties: {
    source: { type: 'string', minLength: 1 },
    externalId: { type: 'string' },
    titleHint: { type: 'string' },
    text: { type: 'string' },
    author: { type: 'string' },
    createdAt: { type: ['string', 'number'] },
    engagement: { type: 'number' }
  },
  required: ['source', 'text', 'author', 'createdAt']
};

const validateRawContent = ajv.compile<RawContentRecord>(rawContentSchema);

function reject(rejection: IngestionRejection): NormalizeResult {
  return { ok: false, rejection };
}

/**
 * Collapse runs of whitespace and trim
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Turn a raw collector record into a canonical ContentItem.
 * Pure: the same record always yields the same item and id.
 */
export function normalize(raw: unknown, matcher: TitleMatcher): NormalizeResult {
  if (!validateRawContent(raw)) {
    return reject({ reason: 'malformed', detail: ajv.errorsText(validateRawContent.errors) });
  }

  const source = raw.source.trim().toLowerCase();
  if (source === SURVEY_SOURCE || source === SOCIAL_SOURCE) {
    return reject({ reason: 'malformed', source, detail: `source "${source}" is reserved` });
  }

  const text = cleanText(raw.text);
  if (text.length === 0) {
    return reject({ reason: 'empty_text', source });
  }

  const createdAtMs = parseTimestamp(raw.createdAt);
  if (createdAtMs === undefined) {
    return reject({ reason: 'invalid_timestamp', source, detail: String(raw.createdAt) });
  }
  const createdAt = new Date(createdAtMs).toISOString();

  const title = matcher.resolve(text, raw.titleHint);
  if (!title) {
    return reject({ reason: 'no_title_match', source });
  }

  const author = raw.author.trim();
  const externalId = raw.externalId?.trim() || undefined;

  const item: ContentItem = {
    id: fingerprint({ source, externalId, author, text, createdAt }),
    source,
    titleId: title.id,
    text,
    author,
    createdAt
  };
  if (raw.engagement !== undefined) {
    item.engagement = raw.engagement;
  }

  return { ok: true, item };
}

/**
 * Collapse a re-ingested item onto the stored one: engagement is
 * last-write-wins, everything else (createdAt included) first-write-wins.
 */
export function mergeContentItems(existing: ContentItem, incoming: ContentItem): ContentItem {
  const merged: ContentItem = {
    id: existing.id,
    source: existing.source,
    titleId: existing.titleId,
    text: existing.text,
    author: existing.author,
    createdAt: existing.createdAt
  };
  const engagement = incoming.engagement ?? existing.engagement;
  if (engagement !== undefined) {
    merged.engagement = engagement;
  }
  return merged;
}

/**
 * Fold items sharing a fingerprint within one batch, in input order
 */
export function dedupeItems(items: ContentItem[]): { items: ContentItem[]; merged: number } {
  const byId = new Map<string, ContentItem>();
  let merged = 0;

  for (const item of items) {
    const existing = byId.get(item.id);
    if (existing) {
      byId.set(item.id, mergeContentItems(existing, item));
      merged++;
    } else {
      byId.set(item.id, item);
    }
  }

  return { items: Array.from(byId.values()), merged };
}
