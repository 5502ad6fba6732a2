/**
 * Default local directories, scanned when no source is configured.
 */

import type { StagedScript } from '../types/script.js';
import type { Transport } from '../types/transport.js';
import { stageFromDirectory } from './staging.js';

/**
 * Scans the default directories in priority order. The first directory that
 * stages at least one file wins; later directories are not scanned.
 */
export class LocalDefaultsTransport implements Transport {
  readonly kind = 'local';
  readonly mountable = false;

  constructor(private readonly dirs: readonly string[]) {}

  describe(): string {
    return `default directories (${this.dirs.join(', ')})`;
  }

  async mount(): Promise<void> {}

  async discover(suffixes: readonly string[], stagingDir: string): Promise<StagedScript[]> {
    for (const dir of this.dirs) {
      const staged = await stageFromDirectory(dir, suffixes, stagingDir);
      if (staged.length > 0) {
        return staged;
      }
    }
    return [];
  }

  async unmount(): Promise<void> {}
}
