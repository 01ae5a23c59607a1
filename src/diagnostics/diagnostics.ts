/**
 * @module diagnostics/diagnostics
 * @description Leveled diagnostic sink consumed by the correlator and the CLI
 * @status COMPLETE
 * @dependencies pino
 * @lastModified 2026-10-14
 */

import type { Logger } from 'pino';

// ============================================================================
// Types
// ============================================================================

export type DiagnosticLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type DiagnosticContext = Record<string, unknown>;

export type DiagnosticFn = (message: string, context?: DiagnosticContext) => void;

/**
 * Where the correlator reports anything that is not a report row.
 * Implementations only receive messages; nothing reads them back.
 */
export interface Diagnostics {
  trace: DiagnosticFn;
  debug: DiagnosticFn;
  info: DiagnosticFn;
  warn: DiagnosticFn;
  error: DiagnosticFn;
}

export interface DiagnosticRecord {
  level: DiagnosticLevel;
  message: string;
  context?: DiagnosticContext;
}

// ============================================================================
// Implementations
// ============================================================================

/**
 * Route diagnostics to a pino logger. Context becomes the log object.
 */
export function createPinoDiagnostics(logger: Logger): Diagnostics {
  const forward =
    (level: DiagnosticLevel): DiagnosticFn =>
    (message, context) => {
      if (context) {
        logger[level](context, message);
      } else {
        logger[level](message);
      }
    };

  return {
    trace: forward('trace'),
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  };
}

/**
 * Keeps every diagnostic in memory, in emission order
 *
 * @example
 * const diagnostics = new MemoryDiagnostics();
 * correlateLines(lines, { diagnostics, sink });
 * diagnostics.messages('warn');
 */
export class MemoryDiagnostics implements Diagnostics {
  readonly records: DiagnosticRecord[] = [];

  readonly trace: DiagnosticFn = (message, context) => this.record('trace', message, context);
  readonly debug: DiagnosticFn = (message, context) => this.record('debug', message, context);
  readonly info: DiagnosticFn = (message, context) => this.record('info', message, context);
  readonly warn: DiagnosticFn = (message, context) => this.record('warn', message, context);
  readonly error: DiagnosticFn = (message, context) => this.record('error', message, context);

  /**
   * Messages at one level, or all messages when no level is given
   */
  messages(level?: DiagnosticLevel): string[] {
    return this.records
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  private record(level: DiagnosticLevel, message: string, context?: DiagnosticContext): void {
    this.records.push(context ? { level, message, context } : { level, message });
  }
}

/**
 * Discards everything
 */
export const silentDiagnostics: Diagnostics = {
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
