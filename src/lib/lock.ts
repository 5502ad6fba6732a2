/**
 * Single-instance session lock.
 *
 * The lock file holds the owner's PID. Its presence alone means another run
 * is active: later invocations do nothing and exit successfully. There is no
 * stale-lock reclaim since the lock lives on a tmpfs that every boot clears.
 */

import { open, readFile, unlink } from 'node:fs/promises';
import type { LockedRun } from '../types/lock.js';
import { AtomicFsError, errorMessage, isErrnoCode } from './fs.js';

/**
 * Creates the lock file exclusively.
 *
 * @returns true if this process now owns the lock, false if it already existed
 * @throws {AtomicFsError} If the lock file cannot be created for another reason
 */
export async function acquireSessionLock(lockPath: string): Promise<boolean> {
  let fileHandle: Awaited<ReturnType<typeof open>>;
  try {
    fileHandle = await open(lockPath, 'wx');
  } catch (error) {
    if (isErrnoCode(error, 'EEXIST')) {
      return false;
    }
    throw new AtomicFsError(
      `Failed to create lock file ${lockPath}: ${errorMessage(error)}`,
      lockPath,
      { cause: error }
    );
  }

  try {
    await fileHandle.writeFile(`${process.pid}\n`, 'utf-8');
  } catch (error) {
    // A lock without a PID would block every later run
    await unlink(lockPath).catch(() => undefined);
    throw new AtomicFsError(
      `Failed to write lock file ${lockPath}: ${errorMessage(error)}`,
      lockPath,
      { cause: error }
    );
  } finally {
    await fileHandle.close();
  }
  return true;
}

/**
 * Reads the PID stored in a lock file, or null when absent or unreadable.
 */
export async function readLockOwner(lockPath: string): Promise<number | null> {
  try {
    const content = await readFile(lockPath, 'utf-8');
    const pid = Number.parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      console.warn(`[WARN] Cannot read lock file ${lockPath}: ${errorMessage(error)}`);
    }
    return null;
  }
}

/**
 * Removes the lock file if it belongs to this process. Never throws: lock
 * cleanup must not change the outcome of a run.
 */
export async function releaseSessionLock(lockPath: string): Promise<void> {
  const owner = await readLockOwner(lockPath);
  if (owner !== process.pid) {
    return;
  }
  try {
    await unlink(lockPath);
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      console.warn(`[WARN] Failed to remove lock file ${lockPath}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Runs `fn` while holding the session lock and releases it on every exit
 * path, thrown errors included. `fn` does not run if the lock is held.
 *
 * @example
 * ```typescript
 * const run = await withSessionLock('/run/autorun.pid', () => runEverything());
 * if (!run.acquired) console.log('already running');
 * ```
 */
export async function withSessionLock<T>(lockPath: string, fn: () => Promise<T>): Promise<LockedRun<T>> {
  if (!(await acquireSessionLock(lockPath))) {
    return { acquired: false };
  }
  try {
    return { acquired: true, value: await fn() };
  } finally {
    await releaseSessionLock(lockPath);
  }
}
