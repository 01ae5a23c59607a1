/**
 * @module io/line-reader
 * @description Line-by-line reading of the job log
 * @status COMPLETE
 * @dependencies src/types
 * @lastModified 2026-10-15
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { MonitorIoError } from '../types';

/**
 * Check the log can be opened, then return its lines as an async iterable.
 * Read failures during iteration surface as MonitorIoError.
 *
 * @example
 * const lines = await openLogLines('jobs.log');
 * for await (const line of lines) { ... }
 */
export async function openLogLines(filePath: string): Promise<AsyncIterable<string>> {
  try {
    const handle = await fs.promises.open(filePath, 'r');
    await handle.close();
  } catch (error) {
    throw new MonitorIoError('INPUT_UNREADABLE', filePath, error);
  }

  return readLines(filePath);
}

async function* readLines(filePath: string): AsyncGenerator<string, void, undefined> {
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      yield line;
    }
  } catch (error) {
    throw new MonitorIoError('INPUT_UNREADABLE', filePath, error);
  } finally {
    lines.close();
    input.destroy();
  }
}
