/**
 * @module monitor
 * @description One monitoring run: job log in, CSV report out
 * @status COMPLETE
 * @dependencies src/io, src/output, src/correlator, src/diagnostics
 * @lastModified 2026-10-15
 */

import type { CorrelationSummary, Thresholds } from './types';
import { openLogLines } from './io';
import { CsvReportWriter, type ReportSink } from './output';
import { correlateLinesAsync, DEFAULT_THRESHOLDS } from './correlator';
import type { Diagnostics } from './diagnostics';

// ============================================================================
// Types
// ============================================================================

export interface MonitorRunOptions {
  inputPath: string;
  outputPath: string;
  thresholds?: Thresholds;
  diagnostics: Diagnostics;
  referenceDate?: Date;
}

export interface MonitorRunResult {
  outputPath: string;
  summary: CorrelationSummary;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Read the job log, write flagged jobs to the report, and return the run
 * summary. Rows written before a fatal error remain in the report.
 *
 * @throws MonitorIoError when the log cannot be read or the report written
 */
export async function monitorJobLog(options: MonitorRunOptions): Promise<MonitorRunResult> {
  const { inputPath, outputPath, diagnostics } = options;

  diagnostics.info(`Processing started for file ${inputPath}`);

  const lines = await openLogLines(inputPath);
  const writer = await CsvReportWriter.open(outputPath);

  let summary: CorrelationSummary;
  try {
    summary = await correlateLinesAsync(lines, {
      sink: writer,
      thresholds: options.thresholds ?? DEFAULT_THRESHOLDS,
      diagnostics,
      referenceDate: options.referenceDate,
    });
  } catch (error) {
    await closeAfterFailure(writer, outputPath, diagnostics);
    throw error;
  }

  await writer.close();

  const skipped = Object.values(summary.skipped).reduce((total, count) => total + count, 0);
  diagnostics.info(
    `Read ${summary.linesRead} lines: ${summary.completedJobs} jobs completed, ` +
      `${summary.rowsWritten} flagged, ${summary.unterminated.length} still running, ${skipped} lines skipped`,
    { ...summary.skipped, duplicateStarts: summary.duplicateStarts }
  );
  diagnostics.info(`Processing finished. Report saved to ${outputPath}`);

  return { outputPath, summary };
}

/**
 * The original failure is the one worth reporting; a second one from
 * closing the report is only noted.
 */
async function closeAfterFailure(
  sink: ReportSink,
  outputPath: string,
  diagnostics: Diagnostics
): Promise<void> {
  try {
    await sink.close();
  } catch (error) {
    diagnostics.warn(
      `Report ${outputPath} was not closed cleanly: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
