/**
 * @module parser/line-parser
 * @description Validates raw `TIMESTAMP,JOB,EVENT,PID` lines into LogLine records
 * @status COMPLETE
 * @dependencies src/types, src/constants.ts
 * @lastModified 2026-10-12
 */

import type { LogLine, JobEventType, ParseError, Result } from '../types';
import { ok, err } from '../types';
import { LINE_FORMAT, JOB_EVENTS } from '../constants';

// ============================================================================
// Constants
// ============================================================================

/**
 * 24-hour time of day, one or two digits per part
 */
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{1,2}):(\d{1,2})$/;

const EVENT_SET: ReadonlySet<string> = new Set(JOB_EVENTS);

// ============================================================================
// Field Splitting
// ============================================================================

/**
 * Split a line on the delimiter into at most `limit` fields.
 * The last field keeps any remaining delimiters.
 *
 * @example
 * splitFields('a,b,c,d,e', ',', 4) // ['a', 'b', 'c', 'd,e']
 */
export function splitFields(line: string, delimiter: string, limit: number): string[] {
  const fields: string[] = [];
  let start = 0;

  while (fields.length < limit - 1) {
    const index = line.indexOf(delimiter, start);
    if (index === -1) break;
    fields.push(line.slice(start, index));
    start = index + delimiter.length;
  }

  fields.push(line.slice(start));
  return fields;
}

// ============================================================================
// Time Parsing
// ============================================================================

export interface TimeOfDay {
  hours: number;
  minutes: number;
  seconds: number;
}

/**
 * Parse `H:M:S` (24-hour). Returns null for anything out of range.
 */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  return { hours, minutes, seconds };
}

/**
 * Pin a time of day to the calendar day of `referenceDate`.
 *
 * Built in UTC so that two times on the same run never differ by a
 * daylight-saving offset. Only differences between results are meaningful.
 */
export function combineWithDate(time: TimeOfDay, referenceDate: Date): Date {
  return new Date(
    Date.UTC(
      referenceDate.getFullYear(),
      referenceDate.getMonth(),
      referenceDate.getDate(),
      time.hours,
      time.minutes,
      time.seconds
    )
  );
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return [time.hours, time.minutes, time.seconds]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

// ============================================================================
// Line Parsing
// ============================================================================

/**
 * Parse one raw log line.
 *
 * @returns `ok(null)` for a blank line, `ok(LogLine)` for a valid record,
 *   or `err(ParseError)` describing why the line was rejected
 *
 * @example
 * const result = parseLine('09:00:00,Backup,START,101', 1, new Date());
 * if (result.success && result.data) {
 *   console.log(result.data.pid); // '101'
 * }
 */
export function parseLine(
  raw: string,
  lineNumber: number,
  referenceDate: Date
): Result<LogLine | null, ParseError> {
  const line = raw.trim();
  if (line === '') {
    return ok(null);
  }

  const parts = splitFields(line, LINE_FORMAT.DELIMITER, LINE_FORMAT.FIELD_COUNT).map((part) =>
    part.trim()
  );

  if (parts.length !== LINE_FORMAT.FIELD_COUNT) {
    return err({
      code: 'MALFORMED_LINE',
      message: `Line ${lineNumber} malformed (${parts.length} fields): ${line}`,
      lineNumber,
      rawLine: line,
    });
  }

  const [timestampText, job, eventText, pid] = parts;

  const time = parseTimeOfDay(timestampText);
  if (!time) {
    return err({
      code: 'TIMESTAMP_PARSE_ERROR',
      message: `Line ${lineNumber} bad timestamp '${timestampText}'`,
      lineNumber,
      rawLine: line,
    });
  }

  const event = eventText.toUpperCase();
  if (!isJobEventType(event)) {
    return err({
      code: 'UNKNOWN_EVENT',
      message: `Line ${lineNumber} unknown event '${event}'`,
      lineNumber,
      rawLine: line,
    });
  }

  return ok({
    lineNumber,
    timestamp: combineWithDate(time, referenceDate),
    timeOfDay: formatTimeOfDay(time),
    job,
    event,
    pid,
  });
}

export function isJobEventType(value: string): value is JobEventType {
  return EVENT_SET.has(value);
}
