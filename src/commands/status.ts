/**
 * Reports the execution records left in the log directory by the last run.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExecutionRecord } from '../types/script.js';
import { errorMessage, isErrnoCode } from '../lib/fs.js';
import { RETURN_FILE_SUFFIX, logPathFor } from '../lib/paths.js';

export interface StatusOptions {
  json?: boolean;
}

/**
 * Rebuilds execution records from the `*.return` sidecars, sorted by script
 * name. Sidecars that do not hold an integer are skipped with a warning.
 */
export async function readExecutionRecords(logDir: string): Promise<ExecutionRecord[]> {
  let entries: string[];
  try {
    entries = await readdir(logDir);
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }

  const records: ExecutionRecord[] = [];
  for (const entry of entries.filter((name) => name.endsWith(RETURN_FILE_SUFFIX)).sort()) {
    const baseName = entry.slice(0, -RETURN_FILE_SUFFIX.length);
    let content: string;
    try {
      content = await readFile(join(logDir, entry), 'utf-8');
    } catch (error) {
      console.warn(`[WARN] Cannot read ${entry}: ${errorMessage(error)}`);
      continue;
    }
    const exitCode = Number.parseInt(content.trim(), 10);
    if (!Number.isInteger(exitCode)) {
      console.warn(`[WARN] ${entry} does not contain an exit code`);
      continue;
    }
    records.push({ baseName, exitCode, logPath: logPathFor(logDir, baseName), aborted: false });
  }
  return records;
}

export function renderStatus(records: readonly ExecutionRecord[]): string {
  if (records.length === 0) {
    return 'No autorun script has been executed.';
  }
  const failed = records.filter((record) => record.exitCode !== 0).length;
  const lines = records.map(
    (record) => `  ${record.exitCode === 0 ? '[OK]  ' : '[FAIL]'} ${record.baseName} (exit ${record.exitCode}) ${record.logPath}`
  );
  return [`Autorun scripts: ${records.length} executed, ${failed} failed`, ...lines].join('\n');
}

export async function statusCommand(logDir: string, options: StatusOptions): Promise<void> {
  const records = await readExecutionRecords(logDir);
  if (options.json) {
    console.log(JSON.stringify(records, null, 2));
    return;
  }
  console.log(renderStatus(records));
}
