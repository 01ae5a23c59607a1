/**
 * @module types/common
 * @description Shared utility types used across all modules
 * @status COMPLETE
 * @dependencies none
 * @lastModified 2026-10-12
 */

// ============================================================================
// Result Type (Error Handling Without Throwing)
// ============================================================================

/**
 * Represents the outcome of an operation that can fail
 * @template T - The success data type
 * @template E - The error type (defaults to Error)
 *
 * @example
 * const result = parseLine(raw, 12);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.error.message);
 * }
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful Result
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed Result
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Standardized error structure for all modules
 */
export interface AppError {
  /** Machine-readable error code */
  code: string;
  /** Human-readable message */
  message: string;
  /** Additional context */
  context?: Record<string, unknown>;
  /** Original error if wrapping */
  cause?: unknown;
}

/**
 * Line-level validation failures. None of these stop a run.
 */
export type ParseErrorCode =
  | 'MALFORMED_LINE'
  | 'TIMESTAMP_PARSE_ERROR'
  | 'UNKNOWN_EVENT';

export interface ParseError extends AppError {
  code: ParseErrorCode;
  lineNumber: number;
  /** Trimmed line content */
  rawLine: string;
}

/**
 * Fatal I/O failures. These abort the run.
 */
export type IoErrorCode = 'INPUT_UNREADABLE' | 'OUTPUT_UNWRITABLE';

/**
 * Thrown when the job log cannot be read or the report cannot be written
 */
export class MonitorIoError extends Error implements AppError {
  readonly code: IoErrorCode;
  readonly path: string;

  constructor(code: IoErrorCode, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      code === 'INPUT_UNREADABLE'
        ? `Cannot read job log ${path}: ${reason}`
        : `Cannot write report ${path}: ${reason}`,
      { cause }
    );
    this.name = 'MonitorIoError';
    this.code = code;
    this.path = path;
  }
}

/**
 * Thrown when run configuration fails validation
 */
export class ConfigError extends Error implements AppError {
  readonly code = 'INVALID_CONFIG';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Time Types
// ============================================================================

/**
 * Duration in seconds
 */
export type Seconds = number;
