/**
 * Sequential script execution with live output forwarding.
 *
 * Scripts run one at a time, in staging order, so that fail-fast has a
 * well-defined meaning. A script's stdout and stderr share one pipe, and each
 * chunk read from it goes to the console and to the script's log at once.
 */

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import { constants as osConstants } from 'node:os';
import type { AutorunConfig } from '../types/config.js';
import type { ExecutionRecord, RunSummary, StagedScript } from '../types/script.js';
import { atomicWriteText, errorMessage, isErrnoCode } from '../lib/fs.js';
import { logPathFor, returnPathFor } from '../lib/paths.js';

/** Exit code recorded when the script file cannot be found */
export const EXIT_NOT_FOUND = 127;
/** Exit code recorded when the script exists but cannot be started */
export const EXIT_CANNOT_EXECUTE = 126;

/** Shell used only to point fd 2 at fd 1 before exec'ing the script */
const LAUNCHER_SHELL = '/bin/sh';
/** The script path is passed as `$0`, never interpolated */
const LAUNCHER_SCRIPT = 'exec "$0" 2>&1';

export interface ExecutorOptions {
  /** Directory receiving `<name>.log` and `<name>.return` */
  logDir: string;
  /** Console stream receiving forwarded output */
  output?: NodeJS.WritableStream;
  /**
   * Interrupts the run. The running script receives the signal named by
   * `signal.reason` (SIGTERM if it names none) and no further script starts.
   */
  signal?: AbortSignal;
}

/**
 * Reads the signal to forward from an abort reason.
 */
export function signalFromReason(reason: unknown): NodeJS.Signals {
  if (reason === 'SIGINT' || reason === 'SIGTERM' || reason === 'SIGHUP' || reason === 'SIGQUIT') {
    return reason;
  }
  return 'SIGTERM';
}

/**
 * Shell-style exit code for a process killed by a signal.
 */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  const numbers: Readonly<Record<string, number | undefined>> = { ...osConstants.signals };
  return 128 + (numbers[signal] ?? 0);
}

/**
 * Per-script log file. Open and write failures are reported once; after that
 * output still reaches the console but no longer the log.
 */
interface ScriptLog {
  write(chunk: Buffer | string): void;
  close(): Promise<void>;
}

function openScriptLog(logPath: string): ScriptLog {
  const stream = createWriteStream(logPath, { flags: 'w' });
  let failed = false;
  stream.on('error', (error: Error) => {
    if (failed) return;
    failed = true;
    console.warn(`[WARN] Cannot write log ${logPath}: ${error.message}`);
  });

  return {
    write(chunk) {
      if (!failed) {
        stream.write(chunk);
      }
    },
    close() {
      if (failed || stream.destroyed) {
        return Promise.resolve();
      }
      return new Promise((resolve) => {
        stream.once('close', () => resolve());
        stream.end();
      });
    },
  };
}

/**
 * Spawns the script and forwards its combined output until it exits and the
 * pipe is drained. Resolves with the exit code; spawn failures resolve with a
 * synthesized code.
 */
function spawnAndForward(
  script: StagedScript,
  log: ScriptLog,
  output: NodeJS.WritableStream,
  signal: AbortSignal | undefined
): Promise<number> {
  return new Promise<number>((resolve) => {
    let settled = false;
    const finish = (code: number) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      resolve(code);
    };

    // The launcher execs the script in place, so signals reach it directly.
    // A missing or non-executable script makes the launcher exit 127 or 126.
    const child = spawn(LAUNCHER_SHELL, ['-c', LAUNCHER_SCRIPT, script.localPath], {
      shell: false,
      stdio: ['inherit', 'pipe', 'inherit'],
    });

    function onAbort(): void {
      child.kill(signalFromReason(signal?.reason));
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (chunk: Buffer) => {
      output.write(chunk);
      log.write(chunk);
    });

    child.once('error', (error: Error) => {
      const code = isErrnoCode(error, 'ENOENT') ? EXIT_NOT_FOUND : EXIT_CANNOT_EXECUTE;
      console.error(`[ERROR] Failed to execute ${script.baseName}: ${error.message}`);
      log.write(`Failed to execute ${script.baseName}: ${error.message}\n`);
      finish(code);
    });

    child.once('close', (code: number | null, killSignal: NodeJS.Signals | null) => {
      if (code !== null) {
        finish(code);
      } else {
        finish(killSignal ? exitCodeForSignal(killSignal) : 1);
      }
    });
  });
}

/**
 * Runs one staged script and persists its exit code next to its log. A log
 * that cannot be written does not stop the script or lose its exit code.
 *
 * @returns The execution record (`aborted` is always false here; the caller
 *   sets it when the sequence stops after this script)
 */
export async function executeScript(script: StagedScript, options: ExecutorOptions): Promise<ExecutionRecord> {
  const output = options.output ?? process.stdout;
  const logPath = logPathFor(options.logDir, script.baseName);
  console.log(`[INFO] Executing ${script.baseName} (from ${script.sourcePath})`);

  const log = openScriptLog(logPath);
  let exitCode: number;
  try {
    exitCode = await spawnAndForward(script, log, output, options.signal);
  } finally {
    await log.close();
  }

  try {
    await atomicWriteText(returnPathFor(options.logDir, script.baseName), `${exitCode}\n`);
  } catch (error) {
    console.warn(`[WARN] Could not record exit code of ${script.baseName}: ${errorMessage(error)}`);
  }

  console.log(`[INFO] ${script.baseName} exited with code ${exitCode}`);
  return { baseName: script.baseName, exitCode, logPath, aborted: false };
}

/**
 * Runs scripts in order. A non-zero exit counts as a failure and stops the
 * sequence unless `config.ignoreFailure` is set.
 */
export async function runScripts(
  scripts: readonly StagedScript[],
  config: AutorunConfig,
  options: ExecutorOptions
): Promise<RunSummary> {
  const records: ExecutionRecord[] = [];
  let failures = 0;

  for (const script of scripts) {
    if (options.signal?.aborted) {
      break;
    }

    const record = await executeScript(script, options);
    records.push(record);

    if (options.signal?.aborted) {
      if (record.exitCode !== 0) failures++;
      record.aborted = true;
      break;
    }

    if (record.exitCode !== 0) {
      failures++;
      if (!config.ignoreFailure) {
        console.error(`[ERROR] ${script.baseName} failed, skipping the remaining scripts`);
        record.aborted = true;
        break;
      }
    }
  }

  const interrupted = options.signal?.aborted ? signalFromReason(options.signal.reason) : null;
  return { records, failures, interrupted };
}
