/**
 * @module output/report-writer
 * @description Report sinks: buffered CSV file writer and an in-memory collector
 * @status COMPLETE
 * @dependencies csv-stringify, src/types, src/constants.ts
 * @lastModified 2026-10-14
 */

import * as fs from 'fs';
import * as path from 'path';
import { once } from 'events';
import { finished } from 'stream/promises';
import { stringify, type Stringifier } from 'csv-stringify';
import type { ReportRow } from '../types';
import { MonitorIoError } from '../types';
import { REPORT_COLUMNS } from '../constants';

// ============================================================================
// Types
// ============================================================================

/**
 * Append-only destination for report rows
 */
export interface ReportSink {
  /** Append one row. Throws if the destination has already failed. */
  write(row: ReportRow): void;
  /** Flush and release the destination */
  close(): Promise<void>;
}

/**
 * Column values of a row, in REPORT_COLUMNS order
 */
export function toRecord(row: ReportRow): string[] {
  return [row.pid, row.job, String(row.durationSec), row.flag];
}

// ============================================================================
// CSV File Writer
// ============================================================================

/**
 * Writes the report as CSV. The header row is written on open, so an
 * empty report still has one line.
 *
 * @example
 * ```typescript
 * const writer = await CsvReportWriter.open('out/report.csv');
 * writer.write({ pid: '101', job: 'Backup', durationSec: 360, flag: 'WARNING' });
 * await writer.close();
 * ```
 */
export class CsvReportWriter implements ReportSink {
  readonly filePath: string;
  private file: fs.WriteStream;
  private stringifier: Stringifier;
  private failure: MonitorIoError | null = null;
  private closed = false;
  private rows = 0;

  private constructor(filePath: string, file: fs.WriteStream) {
    this.filePath = filePath;
    this.file = file;
    this.stringifier = stringify();

    this.stringifier.on('error', (error: Error) => this.fail(error));
    this.file.on('error', (error: Error) => this.fail(error));

    this.stringifier.pipe(this.file);
    this.stringifier.write([...REPORT_COLUMNS]);
  }

  /**
   * Create parent directories and open (truncate) the report file
   */
  static async open(filePath: string): Promise<CsvReportWriter> {
    try {
      await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
      const file = fs.createWriteStream(filePath, { flags: 'w', encoding: 'utf-8' });
      await once(file, 'open');
      return new CsvReportWriter(filePath, file);
    } catch (error) {
      throw new MonitorIoError('OUTPUT_UNWRITABLE', filePath, error);
    }
  }

  /** Rows written so far, header excluded */
  get rowCount(): number {
    return this.rows;
  }

  write(row: ReportRow): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      throw new MonitorIoError('OUTPUT_UNWRITABLE', this.filePath, new Error('writer is closed'));
    }

    this.stringifier.write(toRecord(row));
    this.rows++;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.stringifier.end();

    try {
      await finished(this.file);
    } catch (error) {
      this.fail(error);
    }

    if (this.failure) {
      throw this.failure;
    }
  }

  private fail(error: unknown): void {
    this.failure ??= new MonitorIoError('OUTPUT_UNWRITABLE', this.filePath, error);
  }
}

// ============================================================================
// In-Memory Sink
// ============================================================================

/**
 * Collects rows in memory
 */
export class MemoryReportSink implements ReportSink {
  readonly rows: ReportRow[] = [];
  closed = false;

  write(row: ReportRow): void {
    this.rows.push(row);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Rows as report lines (header excluded), e.g. `101,Backup,360,WARNING`
   */
  lines(): string[] {
    return this.rows.map((row) => toRecord(row).join(','));
  }
}
