/**
 * @module parser
 * @description Job log line parsing exports
 */

export {
  parseLine,
  parseTimeOfDay,
  combineWithDate,
  formatTimeOfDay,
  splitFields,
  isJobEventType,
  type TimeOfDay,
} from './line-parser';
