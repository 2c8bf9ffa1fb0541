import { DateRange, DayKey } from '../common/dates.js';

export type AlignmentStatus = 'both' | 'social_only' | 'survey_only' | 'none';

export interface AlignmentDay {
  date: DayKey;
  status: AlignmentStatus;
  socialMean: number | null;
  surveyNormalized: number | null;
  /** survey minus social; only set when both sides are present */
  delta: number | null;
  /** Pearson correlation over the trailing window, null when undefined */
  rollingAlignment: number | null;
  socialCount: number;
  surveyCount: number;
}

export interface AlignmentReport {
  titleId: string;
  range: DateRange;
  window: number;
  days: AlignmentDay[];
  pairedDays: number;
  overallCorrelation: number | null;
  meanAbsoluteDelta: number | null;
}
