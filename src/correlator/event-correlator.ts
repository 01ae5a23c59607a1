/**
 * @module correlator/event-correlator
 * @description Single-pass pairing of START/END job events by pid
 * @status COMPLETE
 * @dependencies src/parser, src/output, src/diagnostics
 * @lastModified 2026-10-15
 *
 * Each END matched to an open START yields a duration, which is classified
 * and written to the report sink when it reaches a threshold. Bad lines are
 * reported as warnings and skipped; they never stop the run. Errors thrown
 * by the sink propagate to the caller.
 *
 * Times are time-of-day only. A log that crosses midnight gives meaningless
 * durations for the jobs spanning it.
 */

import type {
  CorrelationSummary,
  LogLine,
  OpenJob,
  ParseErrorCode,
  ReportRow,
  SkipCounts,
  Thresholds,
} from '../types';
import { parseLine } from '../parser';
import type { ReportSink } from '../output';
import type { Diagnostics } from '../diagnostics';
import { silentDiagnostics } from '../diagnostics';
import { classifyDuration, DEFAULT_THRESHOLDS } from './classifier';

// ============================================================================
// Options & Types
// ============================================================================

export interface CorrelatorOptions {
  /** Receives flagged rows, in END order */
  sink: ReportSink;
  /** Non-negative, `warningSec < errorSec` (defaults to 300s / 600s) */
  thresholds?: Thresholds;
  diagnostics?: Diagnostics;
  /** Calendar day the times of day are pinned to (defaults to now) */
  referenceDate?: Date;
}

const SKIP_REASON: Record<ParseErrorCode, keyof SkipCounts> = {
  MALFORMED_LINE: 'malformed',
  TIMESTAMP_PARSE_ERROR: 'badTimestamp',
  UNKNOWN_EVENT: 'unknownEvent',
};

// ============================================================================
// Event Correlator Class
// ============================================================================

/**
 * Stateful correlator for one run. Feed lines with `accept`, then call
 * `finish` once at end of stream.
 *
 * @example
 * ```typescript
 * const correlator = new EventCorrelator({ sink, diagnostics });
 * for (const line of lines) correlator.accept(line);
 * const summary = correlator.finish();
 * ```
 */
export class EventCorrelator {
  private readonly sink: ReportSink;
  private readonly thresholds: Thresholds;
  private readonly diagnostics: Diagnostics;
  private readonly referenceDate: Date;

  /** pid -> latest unmatched START; Map keeps insertion order */
  private readonly openJobs = new Map<string, OpenJob>();

  private lineNumber = 0;
  private completedJobs = 0;
  private rowsWritten = 0;
  private duplicateStarts = 0;
  private readonly skipped: SkipCounts = {
    empty: 0,
    malformed: 0,
    badTimestamp: 0,
    unknownEvent: 0,
    orphanEnd: 0,
  };
  private finished = false;

  constructor(options: CorrelatorOptions) {
    this.sink = options.sink;
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
    this.referenceDate = options.referenceDate ?? new Date();
  }

  /** Number of jobs currently open */
  get openCount(): number {
    return this.openJobs.size;
  }

  /**
   * Process the next raw line of the log
   */
  accept(rawLine: string): void {
    if (this.finished) {
      throw new Error('EventCorrelator.accept called after finish');
    }

    this.lineNumber++;
    const lineNumber = this.lineNumber;
    const result = parseLine(rawLine, lineNumber, this.referenceDate);

    if (!result.success) {
      this.skipped[SKIP_REASON[result.error.code]]++;
      this.diagnostics.warn(result.error.message, { line: lineNumber, code: result.error.code });
      return;
    }

    if (result.data === null) {
      this.skipped.empty++;
      this.diagnostics.trace(`Line ${lineNumber}: empty, skipped`);
      return;
    }

    if (result.data.event === 'START') {
      this.handleStart(result.data);
    } else {
      this.handleEnd(result.data);
    }
  }

  /**
   * Close the run: report jobs that never ended and return the summary
   */
  finish(): CorrelationSummary {
    this.finished = true;
    const unterminated = [...this.openJobs.values()];

    for (const open of unterminated) {
      this.diagnostics.info(
        `PID ${open.pid} (${open.job}) still running, no END found (started ${open.startTime})`,
        { pid: open.pid, line: open.lineNumber }
      );
    }

    return {
      linesRead: this.lineNumber,
      completedJobs: this.completedJobs,
      rowsWritten: this.rowsWritten,
      duplicateStarts: this.duplicateStarts,
      skipped: { ...this.skipped },
      unterminated,
    };
  }

  private handleStart(line: LogLine): void {
    if (this.openJobs.has(line.pid)) {
      this.duplicateStarts++;
      this.diagnostics.warn(
        `Line ${line.lineNumber} duplicate START for pid ${line.pid}; overwriting previous start`,
        { line: line.lineNumber, pid: line.pid }
      );
    }

    this.openJobs.set(line.pid, {
      pid: line.pid,
      job: line.job,
      startedAt: line.timestamp,
      startTime: line.timeOfDay,
      lineNumber: line.lineNumber,
    });
  }

  private handleEnd(line: LogLine): void {
    const open = this.openJobs.get(line.pid);
    if (!open) {
      this.skipped.orphanEnd++;
      this.diagnostics.warn(`Line ${line.lineNumber} END for pid ${line.pid} with no START`, {
        line: line.lineNumber,
        pid: line.pid,
      });
      return;
    }

    this.openJobs.delete(line.pid);
    this.completedJobs++;

    const duration = (line.timestamp.getTime() - open.startedAt.getTime()) / 1000;
    const flag = classifyDuration(duration, this.thresholds);

    if (!flag) {
      this.diagnostics.debug(`PID ${open.pid} (${open.job}) finished in ${duration}s`, {
        pid: open.pid,
        line: line.lineNumber,
      });
      return;
    }

    const row: ReportRow = {
      pid: open.pid,
      job: open.job,
      durationSec: Math.round(duration),
      flag,
    };
    this.sink.write(row);
    this.rowsWritten++;
  }
}

// ============================================================================
// Drivers
// ============================================================================

/**
 * Correlate a complete sequence of lines
 *
 * @example
 * const sink = new MemoryReportSink();
 * const summary = correlateLines(content.split('\n'), { sink });
 */
export function correlateLines(lines: Iterable<string>, options: CorrelatorOptions): CorrelationSummary {
  const correlator = new EventCorrelator(options);
  for (const line of lines) {
    correlator.accept(line);
  }
  return correlator.finish();
}

/**
 * Correlate lines from an async source such as a readline interface.
 * A rejection from the source aborts the run and propagates.
 *
 * @example
 * const rl = readline.createInterface({ input: fs.createReadStream('jobs.log') });
 * const summary = await correlateLinesAsync(rl, { sink, diagnostics });
 */
export async function correlateLinesAsync(
  lines: AsyncIterable<string>,
  options: CorrelatorOptions
): Promise<CorrelationSummary> {
  const correlator = new EventCorrelator(options);
  for await (const line of lines) {
    correlator.accept(line);
  }
  return correlator.finish();
}
