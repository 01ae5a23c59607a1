#!/usr/bin/env node
/**
 * @module cli/index
 * @description CLI entry point
 * @status COMPLETE
 * @dependencies commander, src/cli/commands
 * @lastModified 2026-10-16
 */

import { createMonitorCommand } from './commands';

// ============================================================================
// Program Definition
// ============================================================================

const program = createMonitorCommand().name('joblog-monitor').version('0.3.0');

// ============================================================================
// Parse Arguments
// ============================================================================

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
