/**
 * @module correlator
 * @description Event correlation exports
 */

export {
  EventCorrelator,
  correlateLines,
  correlateLinesAsync,
  type CorrelatorOptions,
} from './event-correlator';
export { classifyDuration, DEFAULT_THRESHOLDS } from './classifier';
