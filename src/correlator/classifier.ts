/**
 * @module correlator/classifier
 * @description Duration-to-flag classification
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-12
 */

import type { DurationFlag, Thresholds, Seconds } from '../types';
import { THRESHOLD_DEFAULTS } from '../constants';

export const DEFAULT_THRESHOLDS: Thresholds = {
  warningSec: THRESHOLD_DEFAULTS.WARNING_SECONDS,
  errorSec: THRESHOLD_DEFAULTS.ERROR_SECONDS,
};

/**
 * Flag for a job duration, or null when it is under the warning threshold.
 * Compare the unrounded duration. Thresholds must be non-negative
 * (`resolveConfig` enforces this); only then is a negative duration never
 * flagged.
 */
export function classifyDuration(duration: Seconds, thresholds: Thresholds): DurationFlag | null {
  if (duration >= thresholds.errorSec) {
    return 'ERROR';
  }
  if (duration >= thresholds.warningSec) {
    return 'WARNING';
  }
  return null;
}
