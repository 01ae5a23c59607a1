/**
 * @module constants
 * @description Central constants file for threshold values, report layout, and default paths
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-12
 */

// ============================================================================
// Duration Thresholds (seconds)
// ============================================================================

/**
 * Default duration thresholds for report classification
 */
export const THRESHOLD_DEFAULTS = {
  /** Jobs running at least this long are reported as WARNING */
  WARNING_SECONDS: 300,
  /** Jobs running at least this long are reported as ERROR */
  ERROR_SECONDS: 600,
} as const;

// ============================================================================
// Log Line Format
// ============================================================================

/**
 * Layout of a `TIMESTAMP,JOB,EVENT,PID` record
 */
export const LINE_FORMAT = {
  DELIMITER: ',',
  /** Fields per record; the last one absorbs any further delimiters */
  FIELD_COUNT: 4,
} as const;

/**
 * Accepted EVENT values after upper-casing
 */
export const JOB_EVENTS = ['START', 'END'] as const;

// ============================================================================
// Report Layout
// ============================================================================

/**
 * Header row of the report CSV, in column order
 */
export const REPORT_COLUMNS = ['pid', 'job', 'duration_sec', 'flag'] as const;

// ============================================================================
// Default Paths
// ============================================================================

/**
 * Output locations used when the caller gives none
 */
export const PATH_DEFAULTS = {
  /** Directory for reports: `out/report_<YYYY-MM-DD-HH-MM-SS>.csv` */
  REPORT_DIR: 'out',
  REPORT_PREFIX: 'report_',
  /** Directory for diagnostics: `logs/joblog_monitor_<YYYY-MM-DD>.log` */
  LOG_DIR: 'logs',
  LOG_PREFIX: 'joblog_monitor_',
} as const;

// ============================================================================
// Diagnostics
// ============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export const DEFAULT_LOG_LEVEL = 'info';
