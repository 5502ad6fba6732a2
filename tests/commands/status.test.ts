import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { readExecutionRecords, renderStatus, statusCommand } from '@/commands/status.js';
import { pathsFromOptions } from '@/commands/run.js';
import { DEFAULT_LOCK_FILE } from '@/lib/paths.js';
import { makeTestDir, removeTestDir, silenceConsole } from '../helpers/mocks.js';

describe('status command', () => {
  let testDir: string;
  let logDir: string;

  beforeEach(async () => {
    silenceConsole();
    testDir = await makeTestDir();
    logDir = join(testDir, 'log');
    await mkdir(logDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTestDir(testDir);
  });

  it('should rebuild records from the sidecars sorted by name', async () => {
    await writeFile(join(logDir, 'autorun1.return'), '2\n');
    await writeFile(join(logDir, 'autorun.return'), '0\n');
    await writeFile(join(logDir, 'autorun.log'), 'hello\n');

    expect(await readExecutionRecords(logDir)).toEqual([
      { baseName: 'autorun', exitCode: 0, logPath: join(logDir, 'autorun.log'), aborted: false },
      { baseName: 'autorun1', exitCode: 2, logPath: join(logDir, 'autorun1.log'), aborted: false },
    ]);
  });

  it('should skip sidecars without an exit code', async () => {
    await writeFile(join(logDir, 'autorun.return'), 'garbage\n');

    expect(await readExecutionRecords(logDir)).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[WARN] autorun.return does not contain an exit code');
  });

  it('should return nothing when the log directory does not exist', async () => {
    expect(await readExecutionRecords(join(testDir, 'absent'))).toEqual([]);
  });

  it('should render a summary line and one line per script', () => {
    const text = renderStatus([
      { baseName: 'autorun', exitCode: 0, logPath: '/var/autorun/log/autorun.log', aborted: false },
      { baseName: 'autorun1', exitCode: 3, logPath: '/var/autorun/log/autorun1.log', aborted: false },
    ]);

    expect(text.split('\n')).toEqual([
      'Autorun scripts: 2 executed, 1 failed',
      '  [OK]   autorun (exit 0) /var/autorun/log/autorun.log',
      '  [FAIL] autorun1 (exit 3) /var/autorun/log/autorun1.log',
    ]);
  });

  it('should say when nothing ran', () => {
    expect(renderStatus([])).toBe('No autorun script has been executed.');
  });

  it('should print JSON when asked', async () => {
    await writeFile(join(logDir, 'autorun.return'), '1\n');

    await statusCommand(logDir, { json: true });

    const printed: unknown = JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));
    expect(printed).toEqual([
      { baseName: 'autorun', exitCode: 1, logPath: join(logDir, 'autorun.log'), aborted: false },
    ]);
  });

  it('should derive working paths from the global options', () => {
    const paths = pathsFromOptions({ baseDir: '/tmp/ar', config: '/tmp/effective.json' });

    expect(paths.logDir).toBe('/tmp/ar/log');
    expect(paths.effectiveConfig).toBe('/tmp/effective.json');
    expect(paths.lockFile).toBe(DEFAULT_LOCK_FILE);
  });
});
