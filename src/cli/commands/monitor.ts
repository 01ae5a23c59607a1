/**
 * @module cli/commands/monitor
 * @description Monitor command - pair job events in a log and write the threshold report
 * @status COMPLETE
 * @dependencies commander, src/config, src/monitor, src/diagnostics
 * @lastModified 2026-10-16
 */

import { Command } from 'commander';
import * as path from 'path';
import { resolveConfig, toThresholds, type MonitorConfig } from '../../config';
import { createLogger, createPinoDiagnostics } from '../../diagnostics';
import { monitorJobLog } from '../../monitor';
import { ConfigError, MonitorIoError } from '../../types';
import { THRESHOLD_DEFAULTS, LOG_LEVELS, DEFAULT_LOG_LEVEL } from '../../constants';

// ============================================================================
// Types
// ============================================================================

export interface MonitorOptions {
  output?: string;
  warningThreshold?: string;
  errorThreshold?: string;
  logLevel?: string;
  /** Path, or false from `--no-log-file` */
  logFile?: string | false;
}

/**
 * Process-level collaborators, replaceable in tests
 */
export interface MonitorDeps {
  now?: Date;
  /** Diagnostic stream, stderr by default */
  stderr?: NodeJS.WritableStream;
}

// ============================================================================
// Command Definition
// ============================================================================

export function createMonitorCommand(deps: MonitorDeps = {}): Command {
  return new Command('joblog-monitor')
    .description(
      'Analyse a CSV job log, calculate runtimes, and emit a report highlighting jobs that exceed certain thresholds'
    )
    .argument('<logfile>', 'Path to the CSV job log to analyse')
    .option('-o, --output <file>', 'Report CSV path (default: out/report_<timestamp>.csv)')
    .option(
      '--warning-threshold <seconds>',
      'Flag jobs running at least this long as WARNING',
      String(THRESHOLD_DEFAULTS.WARNING_SECONDS)
    )
    .option(
      '--error-threshold <seconds>',
      'Flag jobs running at least this long as ERROR',
      String(THRESHOLD_DEFAULTS.ERROR_SECONDS)
    )
    .option('--log-level <level>', `Diagnostic level: ${LOG_LEVELS.join(', ')}`, DEFAULT_LOG_LEVEL)
    .option('--log-file <file>', 'Diagnostic log file (default: logs/joblog_monitor_<date>.log)')
    .option('--no-log-file', 'Do not write a diagnostic log file')
    .action(async (logfile: string, options: MonitorOptions) => {
      process.exitCode = await runMonitor(logfile, options, deps);
    });
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Run the monitor and return the process exit code
 */
export async function runMonitor(
  logfile: string,
  options: MonitorOptions,
  deps: MonitorDeps = {}
): Promise<number> {
  const now = deps.now ?? new Date();

  let config: MonitorConfig;
  try {
    config = resolveConfig(
      {
        inputPath: logfile,
        outputPath: options.output,
        warningThreshold: options.warningThreshold,
        errorThreshold: options.errorThreshold,
        logLevel: options.logLevel,
        logFile: options.logFile,
      },
      now
    );
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({
    level: config.logLevel,
    logFile: config.logFile === false ? undefined : config.logFile,
    stream: deps.stderr,
  });
  const diagnostics = createPinoDiagnostics(logger);

  diagnostics.info('Program started.');
  diagnostics.debug('Provided arguments', { logfile, ...options });
  diagnostics.debug(`Log file to analyze: ${config.inputPath}`);
  diagnostics.debug(`Report file: ${config.outputPath}`);

  try {
    await monitorJobLog({
      inputPath: path.resolve(config.inputPath),
      outputPath: path.resolve(config.outputPath),
      thresholds: toThresholds(config),
      diagnostics,
      referenceDate: now,
    });
  } catch (error) {
    if (error instanceof MonitorIoError) {
      diagnostics.error(error.message, { code: error.code, path: error.path });
      return 1;
    }
    throw error;
  }

  diagnostics.info('Program ended.');
  return 0;
}
