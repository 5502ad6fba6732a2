import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { HttpFetchTransport, candidateUrl } from '@/transports/http.js';
import type { FetchFunction } from '@/transports/http.js';
import { makeTestDir, removeTestDir, silenceConsole } from '../helpers/mocks.js';

/**
 * Fetch stand-in serving `files` by URL; anything else is a 404.
 */
function createFakeFetch(files: Record<string, string>): FetchFunction & { urls: string[] } {
  const urls: string[] = [];
  const fakeFetch = async (input: string | URL | Request): Promise<Response> => {
    const url = input instanceof Request ? input.url : String(input);
    urls.push(url);
    const body = files[url];
    return body === undefined ? new Response('not found', { status: 404 }) : new Response(body, { status: 200 });
  };
  return Object.assign(fakeFetch, { urls });
}

describe('candidateUrl', () => {
  it('should join with a single slash', () => {
    expect(candidateUrl('http://boot.lan/scripts', 'autorun1')).toBe('http://boot.lan/scripts/autorun1');
    expect(candidateUrl('http://boot.lan/scripts//', 'autorun')).toBe('http://boot.lan/scripts/autorun');
  });
});

describe('HttpFetchTransport', () => {
  let stagingDir: string;

  beforeEach(async () => {
    silenceConsole();
    stagingDir = await makeTestDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTestDir(stagingDir);
  });

  it('should request every candidate in suffix order and keep the 200s', async () => {
    const fakeFetch = createFakeFetch({
      'http://boot.lan/ar/autorun': 'echo bare\n',
      'http://boot.lan/ar/autorun2': 'echo two\n',
    });
    const transport = new HttpFetchTransport('http://boot.lan/ar', fakeFetch);

    const staged = await transport.discover(['', '1', '2'], stagingDir);

    expect(fakeFetch.urls).toEqual([
      'http://boot.lan/ar/autorun',
      'http://boot.lan/ar/autorun1',
      'http://boot.lan/ar/autorun2',
    ]);
    expect(staged.map((script) => script.baseName)).toEqual(['autorun', 'autorun2']);
    expect(staged[1]).toEqual({
      sourcePath: 'http://boot.lan/ar/autorun2',
      localPath: join(stagingDir, 'autorun2'),
      baseName: 'autorun2',
    });
    expect(await readFile(join(stagingDir, 'autorun2'), 'utf-8')).toBe('echo two\n');
    expect((await stat(join(stagingDir, 'autorun2'))).mode & 0o777).toBe(0o700);
  });

  it('should treat any non-200 status as a miss', async () => {
    const fakeFetch: FetchFunction = async () => new Response('', { status: 204 });

    const staged = await new HttpFetchTransport('http://boot.lan/ar', fakeFetch).discover([''], stagingDir);

    expect(staged).toEqual([]);
    expect(await readdir(stagingDir)).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('[INFO] http://boot.lan/ar/autorun: HTTP 204');
  });

  it('should cancel the body of a missed response', async () => {
    let cancelled = 0;
    const fakeFetch: FetchFunction = async () =>
      new Response(
        new ReadableStream({
          cancel() {
            cancelled++;
          },
        }),
        { status: 404 }
      );

    await new HttpFetchTransport('http://boot.lan/ar', fakeFetch).discover(['', '1'], stagingDir);

    expect(cancelled).toBe(2);
  });

  it('should treat connection failures as misses', async () => {
    const fakeFetch: FetchFunction = async () => {
      throw new TypeError('fetch failed');
    };

    const staged = await new HttpFetchTransport('http://boot.lan/ar', fakeFetch).discover(['', '1'], stagingDir);

    expect(staged).toEqual([]);
    expect(console.log).toHaveBeenCalledWith('[INFO] http://boot.lan/ar/autorun1: fetch failed');
  });

  it('should pass a timeout signal to every request', async () => {
    const signals: Array<AbortSignal | null | undefined> = [];
    const fakeFetch: FetchFunction = async (_input, init) => {
      signals.push(init?.signal);
      return new Response('', { status: 404 });
    };

    await new HttpFetchTransport('http://boot.lan/ar', fakeFetch, 50).discover([''], stagingDir);

    expect(signals).toHaveLength(1);
    expect(signals[0]).toBeInstanceOf(AbortSignal);
  });
});
