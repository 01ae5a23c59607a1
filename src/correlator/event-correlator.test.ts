/**
 * @module correlator/event-correlator.test
 * @description Unit tests for START/END pairing and report classification
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { EventCorrelator, correlateLines, correlateLinesAsync } from './event-correlator';
import { MemoryReportSink, type ReportSink } from '../output';
import { MemoryDiagnostics } from '../diagnostics';
import type { ReportRow } from '../types';

const REFERENCE_DATE = new Date(2026, 9, 12, 8, 0, 0);

describe('EventCorrelator', () => {
  let sink: MemoryReportSink;
  let diagnostics: MemoryDiagnostics;

  beforeEach(() => {
    sink = new MemoryReportSink();
    diagnostics = new MemoryDiagnostics();
  });

  const run = (lines: string[]) =>
    correlateLines(lines, { sink, diagnostics, referenceDate: REFERENCE_DATE });

  // ==========================================================================
  // Classification
  // ==========================================================================

  describe('classification', () => {
    it('emits nothing for a job under the warning threshold', () => {
      run(['09:00:00,Backup,START,101', '09:04:00,Backup,END,101']);

      expect(sink.rows).toEqual([]);
    });

    it('emits a WARNING row between the thresholds', () => {
      run(['09:00:00,Backup,START,101', '09:06:00,Backup,END,101']);

      expect(sink.lines()).toEqual(['101,Backup,360,WARNING']);
    });

    it('emits an ERROR row at or past the error threshold', () => {
      run(['09:00:00,ETL,START,202', '09:12:00,ETL,END,202']);

      expect(sink.lines()).toEqual(['202,ETL,720,ERROR']);
    });

    it('treats the thresholds as inclusive', () => {
      run([
        '09:00:00,A,START,1',
        '09:04:59,A,END,1',
        '09:00:00,B,START,2',
        '09:05:00,B,END,2',
        '09:00:00,C,START,3',
        '09:10:00,C,END,3',
      ]);

      expect(sink.lines()).toEqual(['2,B,300,WARNING', '3,C,600,ERROR']);
    });

    it('applies caller thresholds', () => {
      correlateLines(['10:00:00,Sync,START,s1', '10:01:30,Sync,END,s1'], {
        sink,
        thresholds: { warningSec: 60, errorSec: 120 },
        referenceDate: REFERENCE_DATE,
      });

      expect(sink.rows).toEqual<ReportRow[]>([
        { pid: 's1', job: 'Sync', durationSec: 90, flag: 'WARNING' },
      ]);
    });

    it('drops an END earlier than its START without flagging it', () => {
      const summary = run(['10:00:00,Job,START,1', '09:00:00,Job,END,1']);

      expect(sink.rows).toEqual([]);
      expect(summary.completedJobs).toBe(1);
      expect(diagnostics.messages('debug')).toEqual(['PID 1 (Job) finished in -3600s']);
    });

    it('reports the job name from the START record', () => {
      run(['09:00:00,Nightly import,START,7', '09:20:00,import done,END,7']);

      expect(sink.lines()).toEqual(['7,Nightly import,1200,ERROR']);
    });
  });

  // ==========================================================================
  // Pairing
  // ==========================================================================

  describe('pairing', () => {
    it('writes rows in the order END events arrive', () => {
      run([
        '09:00:00,Alpha,START,a',
        '09:00:00,Beta,START,b',
        '09:20:00,Beta,END,b',
        '09:06:00,Alpha,END,a',
      ]);

      expect(sink.lines()).toEqual(['b,Beta,1200,ERROR', 'a,Alpha,360,WARNING']);
    });

    it('lets a duplicate START replace the open job', () => {
      const summary = run([
        '09:00:00,Old,START,1',
        '09:10:00,New,START,1',
        '09:16:00,New,END,1',
      ]);

      expect(sink.lines()).toEqual(['1,New,360,WARNING']);
      expect(summary.duplicateStarts).toBe(1);
      expect(diagnostics.messages('warn')).toEqual([
        'Line 2 duplicate START for pid 1; overwriting previous start',
      ]);
    });

    it('ignores an END with no open START', () => {
      const correlator = new EventCorrelator({ sink, diagnostics, referenceDate: REFERENCE_DATE });
      correlator.accept('09:00:00,Backup,START,1');
      correlator.accept('09:30:00,Ghost,END,9');

      expect(correlator.openCount).toBe(1);
      expect(sink.rows).toEqual([]);
      expect(diagnostics.messages('warn')).toEqual(['Line 2 END for pid 9 with no START']);
      expect(correlator.finish().skipped.orphanEnd).toBe(1);
    });

    it('ignores a second END for an already closed pid', () => {
      run(['09:00:00,Job,START,1', '09:10:00,Job,END,1', '09:20:00,Job,END,1']);

      expect(sink.lines()).toEqual(['1,Job,600,ERROR']);
      expect(diagnostics.messages('warn')).toEqual(['Line 3 END for pid 1 with no START']);
    });

    it('matches event names case-insensitively', () => {
      run(['09:00:00,Backup,start,101', '09:06:00,Backup,End,101']);

      expect(sink.lines()).toEqual(['101,Backup,360,WARNING']);
    });

    it('treats pids as opaque strings', () => {
      run(['09:00:00,Job,START,007', '09:10:00,Job,END,7']);

      expect(sink.rows).toEqual([]);
      expect(diagnostics.messages('warn')).toEqual(['Line 2 END for pid 7 with no START']);
    });
  });

  // ==========================================================================
  // Invalid Lines
  // ==========================================================================

  describe('invalid lines', () => {
    it('skips a malformed line and keeps processing', () => {
      run(['09:00:00,Backup,START,101', 'garbage,missing,fields', '09:06:00,Backup,END,101']);

      expect(sink.lines()).toEqual(['101,Backup,360,WARNING']);
      expect(diagnostics.records).toContainEqual({
        level: 'warn',
        message: 'Line 2 malformed (3 fields): garbage,missing,fields',
        context: { line: 2, code: 'MALFORMED_LINE' },
      });
    });

    it('skips bad timestamps and unknown events', () => {
      const summary = run([
        '9am,Backup,START,1',
        '09:00:00,Backup,PAUSE,1',
        '09:00:00,Backup,START,1',
        '09:07:00,Backup,END,1',
      ]);

      expect(sink.lines()).toEqual(['1,Backup,420,WARNING']);
      expect(diagnostics.messages('warn')).toEqual([
        "Line 1 bad timestamp '9am'",
        "Line 2 unknown event 'PAUSE'",
      ]);
      expect(summary.skipped.badTimestamp).toBe(1);
      expect(summary.skipped.unknownEvent).toBe(1);
    });

    it('skips blank lines with a trace diagnostic', () => {
      const summary = run(['09:00:00,Backup,START,1', '', '   ', '09:05:00,Backup,END,1']);

      expect(sink.lines()).toEqual(['1,Backup,300,WARNING']);
      expect(diagnostics.messages('trace')).toEqual(['Line 2: empty, skipped', 'Line 3: empty, skipped']);
      expect(summary.skipped.empty).toBe(2);
    });

    it('never writes a skipped line to the report', () => {
      run(['09:00:00,Backup,START', '09:20:00,Backup,END']);

      expect(sink.rows).toEqual([]);
    });
  });

  // ==========================================================================
  // End of Stream
  // ==========================================================================

  describe('end of stream', () => {
    it('lists unterminated jobs in diagnostics only', () => {
      const summary = run(['09:00:00,Job,START,303']);

      expect(sink.rows).toEqual([]);
      expect(diagnostics.messages('info')).toEqual([
        'PID 303 (Job) still running, no END found (started 09:00:00)',
      ]);
      expect(summary.unterminated.map((job) => job.pid)).toEqual(['303']);
    });

    it('lists unterminated jobs in START order', () => {
      const summary = run([
        '8:00:00,First,START,x',
        '08:30:00,Second,START,y',
        '08:45:00,Done,START,z',
        '08:46:00,Done,END,z',
      ]);

      expect(diagnostics.messages('info')).toEqual([
        'PID x (First) still running, no END found (started 08:00:00)',
        'PID y (Second) still running, no END found (started 08:30:00)',
      ]);
      expect(summary.unterminated.map((job) => job.job)).toEqual(['First', 'Second']);
    });

    it('summarizes the run', () => {
      const summary = run([
        '09:00:00,Backup,START,101',
        '',
        'garbage,missing,fields',
        '09:00:00,Backup,START,101',
        '09:06:00,Backup,END,101',
        '09:00:00,Quick,START,102',
        '09:01:00,Quick,END,102',
        '09:02:00,Lost,END,404',
        '09:03:00,Open,START,500',
      ]);

      expect(summary).toEqual({
        linesRead: 9,
        completedJobs: 2,
        rowsWritten: 1,
        duplicateStarts: 1,
        skipped: { empty: 1, malformed: 1, badTimestamp: 0, unknownEvent: 0, orphanEnd: 1 },
        unterminated: [
          {
            pid: '500',
            job: 'Open',
            startedAt: expect.any(Date),
            startTime: '09:03:00',
            lineNumber: 9,
          },
        ],
      });
    });

    it('rejects lines after finish', () => {
      const correlator = new EventCorrelator({ sink });
      correlator.finish();

      expect(() => correlator.accept('09:00:00,Job,START,1')).toThrow(
        'EventCorrelator.accept called after finish'
      );
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  describe('failures', () => {
    it('propagates sink errors', () => {
      const failing: ReportSink = {
        write: () => {
          throw new Error('disk full');
        },
        close: async () => undefined,
      };

      expect(() =>
        correlateLines(['09:00:00,Job,START,1', '09:10:00,Job,END,1'], { sink: failing })
      ).toThrow('disk full');
    });

    it('propagates errors from an async source', async () => {
      async function* source(): AsyncGenerator<string> {
        yield '09:00:00,Job,START,1';
        throw new Error('read failed');
      }

      await expect(correlateLinesAsync(source(), { sink })).rejects.toThrow('read failed');
    });
  });

  describe('correlateLinesAsync', () => {
    it('processes an async source like a sync one', async () => {
      async function* source(): AsyncGenerator<string> {
        yield '09:00:00,ETL,START,202';
        yield '09:12:00,ETL,END,202';
      }

      const summary = await correlateLinesAsync(source(), { sink, referenceDate: REFERENCE_DATE });

      expect(sink.lines()).toEqual(['202,ETL,720,ERROR']);
      expect(summary.rowsWritten).toBe(1);
    });
  });
});
