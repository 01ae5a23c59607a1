/**
 * @module types/events
 * @description Job log records, open jobs, and report rows
 * @status COMPLETE
 * @dependencies src/types/common.ts
 * @lastModified 2026-10-12
 */

import type { Seconds } from './common';

// ============================================================================
// Log Records
// ============================================================================

/**
 * Event kinds accepted in the EVENT column (compared upper-cased)
 */
export type JobEventType = 'START' | 'END';

/**
 * A validated `TIMESTAMP,JOB,EVENT,PID` record
 */
export interface LogLine {
  /** 1-based position in the input */
  lineNumber: number;
  /** Time of day combined with the run's reference date */
  timestamp: Date;
  /** Normalized `HH:MM:SS` form of the time of day */
  timeOfDay: string;
  job: string;
  event: JobEventType;
  /** Opaque correlation key, not necessarily numeric */
  pid: string;
}

// ============================================================================
// Correlation State
// ============================================================================

/**
 * A job whose START has been seen but whose END has not
 */
export interface OpenJob {
  pid: string;
  job: string;
  startedAt: Date;
  /** `HH:MM:SS` of the START record */
  startTime: string;
  /** Line of the START record */
  lineNumber: number;
}

// ============================================================================
// Report
// ============================================================================

export type DurationFlag = 'WARNING' | 'ERROR';

/**
 * One line of the report: a completed job at or past a threshold
 */
export interface ReportRow {
  pid: string;
  job: string;
  /** Rounded to the nearest whole second */
  durationSec: number;
  flag: DurationFlag;
}

/**
 * Threshold pair, both non-negative, `warningSec < errorSec`
 */
export interface Thresholds {
  warningSec: Seconds;
  errorSec: Seconds;
}

/**
 * Counts of lines skipped during a run, by reason
 */
export interface SkipCounts {
  empty: number;
  malformed: number;
  badTimestamp: number;
  unknownEvent: number;
  orphanEnd: number;
}

/**
 * What a correlation run saw and produced
 */
export interface CorrelationSummary {
  linesRead: number;
  /** END records matched to an open START */
  completedJobs: number;
  rowsWritten: number;
  /** START records that replaced an open entry */
  duplicateStarts: number;
  skipped: SkipCounts;
  /** Jobs still open at end of stream, in START order */
  unterminated: OpenJob[];
}
