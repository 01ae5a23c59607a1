/**
 * @module diagnostics
 * @description Diagnostic sink exports
 */

export {
  createPinoDiagnostics,
  MemoryDiagnostics,
  silentDiagnostics,
  type Diagnostics,
  type DiagnosticFn,
  type DiagnosticLevel,
  type DiagnosticContext,
  type DiagnosticRecord,
} from './diagnostics';
export { createLogger, type LoggerOptions } from './logger';
