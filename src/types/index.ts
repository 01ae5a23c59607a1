/**
 * @module types/index
 * @description Central export for all type definitions
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-12
 */

// Common types
export type {
  Result,
  AppError,
  ParseError,
  ParseErrorCode,
  IoErrorCode,
  Seconds,
} from './common';

export { ok, err, MonitorIoError, ConfigError } from './common';

// Event types
export type {
  JobEventType,
  LogLine,
  OpenJob,
  DurationFlag,
  ReportRow,
  Thresholds,
  SkipCounts,
  CorrelationSummary,
} from './events';
