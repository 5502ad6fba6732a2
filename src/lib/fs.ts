/**
 * File system utilities for crash-safe writes and typed reads.
 *
 * Sidecar files use the write-tmp-fsync-rename pattern so a reader never sees
 * a partially written exit code.
 */

import { open, rename, unlink, readFile, stat } from 'node:fs/promises';

/**
 * Error thrown when file operations fail.
 */
export class AtomicFsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AtomicFsError';
  }
}

/**
 * Returns true if `error` is a Node errno error with the given code.
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Describes an unknown thrown value for log lines.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Atomically writes text to a file using the write-tmp-fsync-rename pattern.
 *
 * @throws {AtomicFsError} If the write operation fails
 *
 * @example
 * ```typescript
 * await atomicWriteText('/var/autorun/log/autorun0.return', '0\n');
 * ```
 */
export async function atomicWriteText(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  let fileHandle: Awaited<ReturnType<typeof open>> | null = null;

  try {
    fileHandle = await open(tmpPath, 'w');
    await fileHandle.writeFile(content, 'utf-8');
    await fileHandle.sync();
    await fileHandle.close();
    fileHandle = null;

    await rename(tmpPath, filePath);
  } catch (error) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    await unlink(tmpPath).catch(() => undefined);

    throw new AtomicFsError(
      `Failed to atomically write ${filePath}: ${errorMessage(error)}`,
      filePath,
      { cause: error }
    );
  }
}

/**
 * Reads and parses a JSON file without assuming its shape.
 *
 * @throws {AtomicFsError} If the file cannot be read or parsed. The original
 *   error is kept as `cause` (errno error or SyntaxError).
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new AtomicFsError(
      `Failed to read JSON from ${filePath}: ${errorMessage(error)}`,
      filePath,
      { cause: error }
    );
  }
}

/**
 * Returns true if `filePath` exists (any file type).
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'ENOTDIR')) {
      return false;
    }
    throw error;
  }
}

/**
 * Returns true if `filePath` is a regular file. Missing paths and
 * unreadable entries count as "not a file".
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile();
  } catch {
    return false;
  }
}
