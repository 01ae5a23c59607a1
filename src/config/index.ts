/**
 * @module config
 * @description Run configuration: defaults, default paths, and zod validation
 * @status COMPLETE
 * @dependencies zod, src/constants.ts
 * @lastModified 2026-10-15
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigError, type Thresholds } from '../types';
import {
  THRESHOLD_DEFAULTS,
  PATH_DEFAULTS,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
} from '../constants';

// ============================================================================
// Schema
// ============================================================================

/**
 * Threshold in seconds, from a number or a numeric string. Blank strings are
 * rejected rather than coerced to 0.
 */
const seconds = (label: string) =>
  z
    .union([z.number(), z.string().trim().min(1, `${label} must not be blank`)])
    .pipe(
      z.coerce
        .number({ invalid_type_error: `${label} must be a number of seconds` })
        .finite()
        .nonnegative()
    );

export const MonitorConfigSchema = z
  .object({
    inputPath: z.string().min(1, 'input log path is required'),
    outputPath: z.string().min(1),
    warningThreshold: seconds('warning threshold'),
    errorThreshold: seconds('error threshold'),
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.union([z.string().min(1), z.literal(false)]),
  })
  .refine((config) => config.warningThreshold < config.errorThreshold, {
    message: 'warning threshold must be lower than error threshold',
    path: ['warningThreshold'],
  });

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

/**
 * Caller-supplied settings. Anything omitted takes its default.
 */
export interface MonitorConfigInput {
  inputPath: string;
  outputPath?: string;
  warningThreshold?: number | string;
  errorThreshold?: number | string;
  logLevel?: string;
  /** `false` disables the diagnostic log file */
  logFile?: string | false;
}

// ============================================================================
// Default Paths
// ============================================================================

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local date as `YYYY-MM-DD`
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Local date and time as `YYYY-MM-DD-HH-MM-SS`
 */
export function formatDateTimeStamp(date: Date): string {
  return `${formatDateStamp(date)}-${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

export function defaultReportPath(now: Date): string {
  return path.join(PATH_DEFAULTS.REPORT_DIR, `${PATH_DEFAULTS.REPORT_PREFIX}${formatDateTimeStamp(now)}.csv`);
}

export function defaultLogPath(now: Date): string {
  return path.join(PATH_DEFAULTS.LOG_DIR, `${PATH_DEFAULTS.LOG_PREFIX}${formatDateStamp(now)}.log`);
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Apply defaults and validate
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(input: MonitorConfigInput, now: Date = new Date()): MonitorConfig {
  const result = MonitorConfigSchema.safeParse({
    inputPath: input.inputPath,
    outputPath: input.outputPath ?? defaultReportPath(now),
    warningThreshold: input.warningThreshold ?? THRESHOLD_DEFAULTS.WARNING_SECONDS,
    errorThreshold: input.errorThreshold ?? THRESHOLD_DEFAULTS.ERROR_SECONDS,
    logLevel: input.logLevel ?? DEFAULT_LOG_LEVEL,
    logFile: input.logFile ?? defaultLogPath(now),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  return result.data;
}

export function toThresholds(config: MonitorConfig): Thresholds {
  return {
    warningSec: config.warningThreshold,
    errorSec: config.errorThreshold,
  };
}
