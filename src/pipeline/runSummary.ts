import { v4 as uuidv4 } from 'uuid';
import { RejectionReason } from '../normalizer/types.js';
import { emptyModelCounts, SentimentModel } from '../scoring/types.js';

/**
 * What one pipeline run did. Every counter is always present.
 */
export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  ingested: number;
  merged: number;
  rejected: number;
  rejectedByReason: Record<RejectionReason, number>;
  surveyStored: number;
  surveyRejected: number;
  /** Items and survey responses the store failed to write */
  writeFailures: number;
  scoredByModel: Record<SentimentModel, number>;
  skipped: number;
  scoringFailures: number;
  deferred: number;
  aggregatesRecomputed: number;
  aggregationFailures: number;
}

export function emptyRejectionCounts(): Record<RejectionReason, number> {
  return { malformed: 0, invalid_timestamp: 0, empty_text: 0, no_title_match: 0 };
}

export function createRunSummary(startedAt: Date = new Date()): RunSummary {
  return {
    runId: uuidv4(),
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    cancelled: false,
    ingested: 0,
    merged: 0,
    rejected: 0,
    rejectedByReason: emptyRejectionCounts(),
    surveyStored: 0,
    surveyRejected: 0,
    writeFailures: 0,
    scoredByModel: emptyModelCounts(),
    skipped: 0,
    scoringFailures: 0,
    deferred: 0,
    aggregatesRecomputed: 0,
    aggregationFailures: 0
  };
}
