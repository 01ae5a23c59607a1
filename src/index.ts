/**
 * @module index
 * @description Main package entry point
 * @status COMPLETE
 * @dependencies all modules
 * @lastModified 2026-10-16
 */

// Type exports
export * from './types';

// Parser exports
export { parseLine, parseTimeOfDay, splitFields } from './parser';
export type { TimeOfDay } from './parser';

// Correlator exports
export {
  EventCorrelator,
  correlateLines,
  correlateLinesAsync,
  classifyDuration,
  DEFAULT_THRESHOLDS,
} from './correlator';
export type { CorrelatorOptions } from './correlator';

// Output exports
export { CsvReportWriter, MemoryReportSink } from './output';
export type { ReportSink } from './output';

// Diagnostics exports
export { createLogger, createPinoDiagnostics, MemoryDiagnostics, silentDiagnostics } from './diagnostics';
export type { Diagnostics, DiagnosticLevel } from './diagnostics';

// Config exports
export { resolveConfig, MonitorConfigSchema } from './config';
export type { MonitorConfig, MonitorConfigInput } from './config';

// Run exports
export { openLogLines } from './io';
export { monitorJobLog } from './monitor';
export type { MonitorRunOptions, MonitorRunResult } from './monitor';
