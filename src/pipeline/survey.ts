import Ajv from 'ajv';
import { parseTimestamp } from '../common/dates.js';
import { TitleMatcher } from '../normalizer/titleMatcher.js';
import { SurveyResponse } from '../store/types.js';

/**
 * Survey answer as exported by the survey tool
 */
export interface RawSurveyResponse {
  respondentId: string;
  titleId: string;
  satisfaction: number;
  submittedAt: string | number;
  wouldRecommend?: boolean;
  completionRate?: number;
}

export type SurveyRejectionReason = 'malformed' | 'invalid_timestamp' | 'unknown_title' | 'out_of_scale';

export type SurveyNormalizeResult =
  | { ok: true; response: SurveyResponse }
  | { ok: false; reason: SurveyRejectionReason };

const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

const validateRawSurvey = ajv.compile<RawSurveyResponse>({
  type: 'object',
  properties: {
    respondentId: { type: 'string', pattern: '\\S' },
    titleId: { type: 'string', minLength: 1 },
    satisfaction: { type: 'number' },
    submittedAt: { type: ['string', 'number'] },
    wouldRecommend: { type: 'boolean' },
    completionRate: { type: 'number', minimum: 0, maximum: 1 }
  },
  required: ['respondentId', 'titleId', 'satisfaction', 'submittedAt']
});

export function normalizeSurveyResponse(
  raw: unknown,
  titles: TitleMatcher,
  scale: { min: number; max: number }
): SurveyNormalizeResult {
  if (!validateRawSurvey(raw)) {
    return { ok: false, reason: 'malformed' };
  }
  const submittedMs = parseTimestamp(raw.submittedAt);
  if (submittedMs === undefined) {
    return { ok: false, reason: 'invalid_timestamp' };
  }
  if (!titles.has(raw.titleId)) {
    return { ok: false, reason: 'unknown_title' };
  }
  if (raw.satisfaction < scale.min || raw.satisfaction > scale.max) {
    return { ok: false, reason: 'out_of_scale' };
  }

  const response: SurveyResponse = {
    respondentId: raw.respondentId.trim(),
    titleId: raw.titleId,
    satisfaction: raw.satisfaction,
    submittedAt: new Date(submittedMs).toISOString()
  };
  if (raw.wouldRecommend !== undefined) response.wouldRecommend = raw.wouldRecommend;
  if (raw.completionRate !== undefined) response.completionRate = raw.completionRate;
  return { ok: true, response };
}
