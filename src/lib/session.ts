/**
 * Session housekeeping around a run: working directories, staged-copy
 * cleanup, and the final "press a key" gate.
 */

import { mkdir, unlink } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import type { AutorunConfig } from '../types/config.js';
import type { StagedScript } from '../types/script.js';
import type { AutorunPaths } from './paths.js';
import { errorMessage, isErrnoCode, pathExists } from './fs.js';

/**
 * Waits for the user. Injected so that tests and non-interactive callers do
 * not block on the terminal.
 */
export type KeypressWaiter = () => Promise<void>;

/**
 * Input stream for the keypress gate; raw mode is used when available.
 */
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Creates the base working tree if missing. Idempotent.
 */
export async function ensureDirectories(paths: AutorunPaths): Promise<void> {
  for (const dir of [paths.baseDir, paths.logDir, paths.tmpDir, paths.mntDir]) {
    await mkdir(dir, { recursive: true });
  }
}

/**
 * Deletes the staged local copies unless `noDelete` is set. The original
 * sources are never touched.
 *
 * @returns Paths that were deleted
 */
export async function cleanupStaged(
  scripts: readonly StagedScript[],
  config: AutorunConfig
): Promise<string[]> {
  if (config.noDelete) {
    return [];
  }
  const deleted: string[] = [];
  for (const script of scripts) {
    try {
      await unlink(script.localPath);
      deleted.push(script.localPath);
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) {
        console.warn(`[WARN] Failed to delete ${script.localPath}: ${errorMessage(error)}`);
      }
    }
  }
  return deleted;
}

/**
 * If the no-wait sentinel exists, consumes it and returns a config with
 * `noWait` forced on for this run.
 */
export async function applyNoWaitOverride(config: AutorunConfig, nowaitFile: string): Promise<AutorunConfig> {
  if (!(await pathExists(nowaitFile))) {
    return config;
  }
  try {
    await unlink(nowaitFile);
  } catch (error) {
    console.warn(`[WARN] Failed to remove ${nowaitFile}: ${errorMessage(error)}`);
  }
  return Object.freeze({ ...config, noWait: true });
}

/**
 * Blocks for a keypress when waiting is enabled and at least one script ran.
 *
 * @returns true if it waited
 */
export async function interactiveGate(
  config: AutorunConfig,
  scriptsRan: boolean,
  waitForKey: KeypressWaiter
): Promise<boolean> {
  if (config.noWait || !scriptsRan) {
    return false;
  }
  await waitForKey();
  return true;
}

/**
 * Waits for a single keypress on a TTY, or one line of input otherwise.
 * Resolves as well when the input ends.
 */
export async function waitForKeypress(
  input: KeyInput = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const prompt = 'Autorun scripts completed, press any key to continue... ';

  if (!input.isTTY || !input.setRawMode) {
    const rl = createInterface({ input, output });
    const closed = new Promise<void>((resolve) => rl.once('close', () => resolve()));
    try {
      await Promise.race([rl.question(prompt), closed]);
    } finally {
      rl.close();
    }
    return;
  }

  output.write(prompt);
  input.setRawMode(true);
  input.resume();
  try {
    await new Promise<void>((resolve) => {
      const done = () => {
        input.off('data', done);
        input.off('end', done);
        resolve();
      };
      input.once('data', done);
      input.once('end', done);
    });
  } finally {
    input.setRawMode(false);
    input.pause();
    output.write('\n');
  }
}
