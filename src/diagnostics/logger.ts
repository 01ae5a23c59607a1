/**
 * @module diagnostics/logger
 * @description Builds the per-run pino logger: stderr plus an optional append-mode file
 * @status COMPLETE
 * @dependencies pino
 * @lastModified 2026-10-14
 */

import pino, { type Logger, type StreamEntry } from 'pino';
import type { DiagnosticLevel } from './diagnostics';

export interface LoggerOptions {
  level: DiagnosticLevel;
  /** Diagnostic log file, appended to; parent directories are created */
  logFile?: string;
  /** Defaults to stderr */
  stream?: NodeJS.WritableStream;
}

/**
 * Create the logger for one run. Build it once and pass it down.
 */
export function createLogger(options: LoggerOptions): Logger {
  const streams: StreamEntry[] = [
    { level: options.level, stream: options.stream ?? pino.destination({ dest: 2, sync: true }) },
  ];

  if (options.logFile) {
    streams.push({
      level: options.level,
      stream: pino.destination({ dest: options.logFile, append: true, mkdir: true, sync: true }),
    });
  }

  return pino(
    {
      level: options.level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.multistream(streams)
  );
}
