/**
 * One complete autorun session.
 *
 * Flow:
 * 1. LOCK: acquire the session lock, or do nothing if another run holds it
 * 2. SETUP: create the working tree, load the configuration
 * 3. RESOLVE: stage scripts from the configured source
 * 4. STAGE: normalize text scripts
 * 5. EXECUTE: run scripts in order with fail-fast
 * 6. END: delete staged copies, wait for a keypress, release the lock
 *
 * Interrupt policy: SIGINT/SIGTERM handlers cover the whole time the lock is
 * held. While scripts run, the signal is forwarded to the running script, no
 * further script starts, and the run ends with the shell-style code for that
 * signal after normal cleanup. At any other point the lock is released and
 * the process exits with that code right away.
 */

import type { AutorunConfig } from '../types/config.js';
import type { RunSummary, StagedScript } from '../types/script.js';
import type { CommandRunner } from '../types/transport.js';
import type { FetchFunction } from '../transports/index.js';
import type { AutorunPaths } from '../lib/paths.js';
import { ConfigError, loadAutorunConfig } from '../lib/config.js';
import { TransportError } from '../lib/mount.js';
import { releaseSessionLock, withSessionLock } from '../lib/lock.js';
import {
  applyNoWaitOverride,
  cleanupStaged,
  ensureDirectories,
  interactiveGate,
  waitForKeypress,
} from '../lib/session.js';
import type { KeypressWaiter } from '../lib/session.js';
import { resolveScripts } from './resolver.js';
import { normalizeScript } from './stager.js';
import { exitCodeForSignal, runScripts } from './executor.js';

/** Exit code for fatal setup and transport errors */
export const EXIT_FATAL = 1;
/** Highest exit code a process can report */
const MAX_EXIT_CODE = 255;

export interface EngineOptions {
  paths: AutorunPaths;
  runCommand?: CommandRunner;
  fetch?: FetchFunction;
  sleep?: (ms: number) => Promise<void>;
  /** Console stream receiving script output */
  output?: NodeJS.WritableStream;
  waitForKey?: KeypressWaiter;
  /** Ends the process after an interrupt outside script execution */
  exit?: (code: number) => void;
}

/**
 * Signal handling for one locked session.
 */
interface SessionInterrupts {
  /** Aborted with the signal name while scripts are running */
  signal: AbortSignal;
  /** Runs `work` with signals forwarded to the running script */
  forwardDuring<T>(work: () => Promise<T>): Promise<T>;
  remove(): void;
}

/**
 * Installs SIGINT/SIGTERM handlers for the time the lock is held. Inside
 * `forwardDuring` a signal aborts the controller; elsewhere it releases the
 * lock and exits with 128+n.
 */
function installSessionSignalHandlers(lockFile: string, exit: (code: number) => void): SessionInterrupts {
  const controller = new AbortController();
  let forwarding = false;

  const handlers = (['SIGINT', 'SIGTERM'] as const).map((name) => {
    const handler = () => {
      if (forwarding) {
        console.log(`\n[INFO] ${name} received, stopping after the current script`);
        controller.abort(name);
        return;
      }
      console.log(`\n[INFO] ${name} received, releasing ${lockFile}`);
      const code = exitCodeForSignal(name);
      void releaseSessionLock(lockFile).then(() => exit(code));
    };
    process.on(name, handler);
    return [name, handler] as const;
  });

  return {
    signal: controller.signal,
    async forwardDuring<T>(work: () => Promise<T>): Promise<T> {
      forwarding = true;
      try {
        return await work();
      } finally {
        forwarding = false;
      }
    },
    remove() {
      for (const [name, handler] of handlers) {
        process.off(name, handler);
      }
    },
  };
}

/**
 * Maps a run summary to the process exit code: the signal code when
 * interrupted, the failure count otherwise.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) {
    return exitCodeForSignal(summary.interrupted);
  }
  return Math.min(summary.failures, MAX_EXIT_CODE);
}

async function loadConfigOrNull(paths: AutorunPaths): Promise<AutorunConfig | null> {
  try {
    return await loadAutorunConfig(paths.effectiveConfig, paths.cmdline);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[FATAL] ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function resolveOrNull(config: AutorunConfig, options: EngineOptions): Promise<StagedScript[] | null> {
  try {
    return await resolveScripts(config, options);
  } catch (error) {
    if (error instanceof TransportError) {
      console.error(`[FATAL] ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function runSession(options: EngineOptions, interrupts: SessionInterrupts): Promise<number> {
  const { paths } = options;
  await ensureDirectories(paths);

  const loaded = await loadConfigOrNull(paths);
  if (loaded === null) {
    return EXIT_FATAL;
  }
  if (loaded.disabled) {
    console.log('[INFO] Autorun is disabled');
    return 0;
  }
  const config = await applyNoWaitOverride(loaded, paths.nowaitFile);

  const scripts = await resolveOrNull(config, options);
  if (scripts === null) {
    return EXIT_FATAL;
  }
  if (scripts.length === 0) {
    console.log('[INFO] No autorun script found');
    return 0;
  }

  for (const script of scripts) {
    await normalizeScript(script);
  }

  let summary: RunSummary;
  try {
    summary = await interrupts.forwardDuring(() =>
      runScripts(scripts, config, {
        logDir: paths.logDir,
        output: options.output,
        signal: interrupts.signal,
      })
    );
  } finally {
    await cleanupStaged(scripts, config);
  }

  console.log(`[INFO] ${summary.records.length} script(s) executed, ${summary.failures} failed`);
  if (!summary.interrupted) {
    await interactiveGate(config, summary.records.length > 0, options.waitForKey ?? (() => waitForKeypress()));
  }
  return exitCodeFor(summary);
}

/**
 * Runs a full autorun session and returns the process exit code.
 *
 * - 0: nothing failed, nothing to do, autorun disabled, or another run active
 * - 1..255: number of failed scripts (capped), or 1 on a fatal setup or
 *   mount error
 * - 128+n: interrupted by signal n
 */
export async function runAutorun(options: EngineOptions): Promise<number> {
  const { lockFile } = options.paths;
  const run = await withSessionLock(lockFile, async () => {
    const interrupts = installSessionSignalHandlers(lockFile, options.exit ?? ((code) => process.exit(code)));
    try {
      return await runSession(options, interrupts);
    } finally {
      interrupts.remove();
    }
  });
  if (!run.acquired) {
    console.log(`[INFO] Another autorun session holds ${lockFile}, nothing to do`);
    return 0;
  }
  return run.value;
}
