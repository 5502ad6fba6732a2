/**
 * HTTP(S) source: candidates are fetched as `<url>/autorun<suffix>`.
 *
 * A single `discover()` call is one attempt; the retry loop lives in the
 * source resolver.
 */

import { chmod, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { StagedScript } from '../types/script.js';
import type { Transport } from '../types/transport.js';
import { errorMessage } from '../lib/fs.js';
import { candidateName } from '../lib/suffixes.js';
import { STAGED_FILE_MODE } from './staging.js';

/** Per-request timeout */
export const HTTP_TIMEOUT_MS = 10_000;

export type FetchFunction = typeof fetch;

/**
 * Joins a base URL and a candidate name with exactly one slash.
 */
export function candidateUrl(baseUrl: string, name: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${name}`;
}

export class HttpFetchTransport implements Transport {
  readonly kind = 'http';
  readonly mountable = false;

  constructor(
    private readonly url: string,
    private readonly fetchImpl: FetchFunction = fetch,
    private readonly timeoutMs: number = HTTP_TIMEOUT_MS
  ) {}

  describe(): string {
    return `http source ${this.url}`;
  }

  async mount(): Promise<void> {}

  async discover(suffixes: readonly string[], stagingDir: string): Promise<StagedScript[]> {
    const staged: StagedScript[] = [];
    for (const suffix of suffixes) {
      const baseName = candidateName(suffix);
      const sourcePath = candidateUrl(this.url, baseName);
      const localPath = join(stagingDir, baseName);
      if (await this.download(sourcePath, localPath)) {
        console.log(`[INFO] Fetched ${sourcePath}`);
        staged.push({ sourcePath, localPath, baseName });
      }
    }
    return staged;
  }

  async unmount(): Promise<void> {}

  /**
   * Downloads one file. Returns false on any miss (non-200, connection
   * failure, timeout, write failure); nothing is left on disk in that case.
   */
  private async download(sourcePath: string, localPath: string): Promise<boolean> {
    let body: Buffer;
    try {
      const response = await this.fetchImpl(sourcePath, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (response.status !== 200) {
        await response.body?.cancel();
        console.log(`[INFO] ${sourcePath}: HTTP ${response.status}`);
        return false;
      }
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      console.log(`[INFO] ${sourcePath}: ${errorMessage(error)}`);
      return false;
    }

    try {
      await writeFile(localPath, body);
      await chmod(localPath, STAGED_FILE_MODE);
      return true;
    } catch (error) {
      console.error(`[ERROR] Failed to store ${sourcePath}: ${errorMessage(error)}`);
      await unlink(localPath).catch(() => undefined);
      return false;
    }
  }
}
