/**
 * Copies candidate scripts from a directory into the staging directory.
 */

import { chmod, copyFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { StagedScript } from '../types/script.js';
import { errorMessage, isRegularFile } from '../lib/fs.js';
import { candidateName } from '../lib/suffixes.js';

/** Mode given to staged copies */
export const STAGED_FILE_MODE = 0o700;

/**
 * Stages `autorun<suffix>` from `dir` for every suffix, in order. Missing
 * candidates are skipped; a failed copy is logged and left out.
 */
export async function stageFromDirectory(
  dir: string,
  suffixes: readonly string[],
  stagingDir: string
): Promise<StagedScript[]> {
  const staged: StagedScript[] = [];

  for (const suffix of suffixes) {
    const baseName = candidateName(suffix);
    const sourcePath = join(dir, baseName);
    if (!(await isRegularFile(sourcePath))) {
      continue;
    }

    const localPath = join(stagingDir, baseName);
    try {
      await copyFile(sourcePath, localPath);
      await chmod(localPath, STAGED_FILE_MODE);
    } catch (error) {
      console.error(`[ERROR] Failed to copy ${sourcePath}: ${errorMessage(error)}`);
      await unlink(localPath).catch(() => undefined);
      continue;
    }

    console.log(`[INFO] Staged ${sourcePath}`);
    staged.push({ sourcePath, localPath, baseName });
  }

  return staged;
}
