/**
 * Fixture test: Legacy suffix option.
 *
 * Verifies that `autoruns=` on the boot command line replaces ar_suffixes.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { join } from 'node:path';
import { readdir, writeFile } from 'node:fs/promises';
import { runAutorun } from '@/runner/engine.js';
import type { AutorunPaths } from '@/lib/paths.js';
import {
  createTestPaths,
  makeTestDir,
  removeTestDir,
  silenceConsole,
  writeEffectiveConfig,
  writeScript,
} from '../helpers/mocks.js';

describe('F011: legacy suffix option', () => {
  let testDir: string;
  let paths: AutorunPaths;

  beforeEach(async () => {
    silenceConsole();
    testDir = await makeTestDir();
    paths = await createTestPaths(testDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTestDir(testDir);
  });

  it('should only run the suffixes named on the boot command line', async () => {
    await writeEffectiveConfig(paths.effectiveConfig, { ar_nowait: true, ar_suffixes: '1,2,3' });
    await writeFile(paths.cmdline, 'BOOT_IMAGE=/boot/vmlinuz quiet autoruns=3,1\n');
    for (const name of ['autorun1', 'autorun2', 'autorun3']) {
      await writeScript(join(paths.defaultDirs[0], name), '#!/bin/sh\nexit 0\n');
    }

    expect(await runAutorun({ paths, output: new PassThrough() })).toBe(0);
    expect((await readdir(paths.logDir)).sort()).toEqual([
      'autorun1.log',
      'autorun1.return',
      'autorun3.log',
      'autorun3.return',
    ]);
  });
});
