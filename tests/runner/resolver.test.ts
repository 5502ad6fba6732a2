import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RETRY_DELAY_MS, classifySource, createTransport, resolveScripts } from '@/runner/resolver.js';
import { TransportError } from '@/lib/mount.js';
import type { FetchFunction } from '@/transports/http.js';
import type { AutorunPaths } from '@/lib/paths.js';
import {
  createFakeRunner,
  createMockConfig,
  createTestPaths,
  makeTestDir,
  removeTestDir,
  silenceConsole,
} from '../helpers/mocks.js';

describe('classifySource', () => {
  it('should classify each source prefix', () => {
    expect(classifySource('/dev/sdb1')).toEqual({ kind: 'block', device: '/dev/sdb1' });
    expect(classifySource('nfs://server/exports/ar')).toEqual({ kind: 'nfs', share: 'server:/exports/ar' });
    expect(classifySource('smb://fileserver/rescue')).toEqual({ kind: 'smb', share: '//fileserver/rescue' });
    expect(classifySource('http://boot.lan/ar')).toEqual({ kind: 'http', url: 'http://boot.lan/ar' });
    expect(classifySource('https://boot.lan/ar')).toEqual({ kind: 'http', url: 'https://boot.lan/ar' });
  });

  it('should fall back to local defaults for empty sources', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(classifySource('')).toEqual({ kind: 'local' });
    expect(classifySource('  ')).toEqual({ kind: 'local' });
    expect(console.warn).not.toHaveBeenCalled();

    vi.restoreAllMocks();
  });

  it('should warn and fall back for unrecognized sources', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(classifySource('ftp://boot.lan/ar')).toEqual({ kind: 'local' });
    expect(console.warn).toHaveBeenCalledWith(
      "[WARN] Unrecognized autorun source 'ftp://boot.lan/ar', using default directories"
    );

    vi.restoreAllMocks();
  });
});

describe('resolveScripts', () => {
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

  it('should create exactly one transport per source kind', () => {
    const run = createFakeRunner();
    expect(createTransport({ kind: 'local' }, { paths }).kind).toBe('local');
    expect(createTransport({ kind: 'block', device: '/dev/sr0' }, { paths, runCommand: run }).kind).toBe('block');
    expect(createTransport({ kind: 'nfs', share: 'srv:/' }, { paths, runCommand: run }).kind).toBe('nfs');
    expect(createTransport({ kind: 'smb', share: '//srv/x' }, { paths, runCommand: run }).kind).toBe('smb');
    expect(createTransport({ kind: 'http', url: 'http://boot.lan' }, { paths }).kind).toBe('http');
  });

  it('should stage from the default directories with the configured suffixes', async () => {
    await writeFile(join(paths.defaultDirs[0], 'autorun1'), 'echo one\n');
    await writeFile(join(paths.defaultDirs[0], 'autorun9'), 'echo nine\n');

    const staged = await resolveScripts(createMockConfig({ suffixes: '1,2' }), { paths });

    expect(staged.map((script) => script.baseName)).toEqual(['autorun1']);
  });

  it('should retry HTTP sources with a pause between attempts only', async () => {
    let requests = 0;
    const fakeFetch: FetchFunction = async () => {
      requests++;
      return new Response('', { status: 404 });
    };
    const sleep = vi.fn(async (_ms: number) => undefined);

    const staged = await resolveScripts(createMockConfig({ source: 'http://boot.lan/ar', attempts: 3, suffixes: '1' }), {
      paths,
      fetch: fakeFetch,
      sleep,
    });

    expect(staged).toEqual([]);
    expect(requests).toBe(6);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(RETRY_DELAY_MS);
  });

  it('should stop retrying once an attempt stages a script', async () => {
    let round = 0;
    const fakeFetch: FetchFunction = async () => {
      round++;
      return round >= 2 ? new Response('echo late\n', { status: 200 }) : new Response('', { status: 503 });
    };
    const sleep = vi.fn(async (_ms: number) => undefined);

    const staged = await resolveScripts(createMockConfig({ source: 'http://boot.lan/ar', attempts: 5 }), {
      paths,
      fetch: fakeFetch,
      sleep,
    });

    expect(staged.map((script) => script.baseName)).toEqual(['autorun']);
    expect(round).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should not retry local sources', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);

    const staged = await resolveScripts(createMockConfig({ attempts: 4 }), { paths, sleep });

    expect(staged).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should unmount after discovery even when nothing is found', async () => {
    const run = createFakeRunner();

    const staged = await resolveScripts(createMockConfig({ source: '/dev/sdb1' }), { paths, runCommand: run });

    expect(staged).toEqual([]);
    expect(run.calls.map((call) => call.cmd)).toEqual(['mount', 'umount']);
  });

  it('should propagate a failed mount without unmounting', async () => {
    const run = createFakeRunner({ exitCode: 32, stderr: 'special device does not exist' });

    await expect(
      resolveScripts(createMockConfig({ source: 'nfs://server/exports' }), { paths, runCommand: run })
    ).rejects.toBeInstanceOf(TransportError);
    expect(run.calls).toEqual([
      { cmd: 'mount', args: ['-t', 'nfs', '-o', 'nolock', 'server:/exports', paths.mntDir] },
    ]);
  });
});
