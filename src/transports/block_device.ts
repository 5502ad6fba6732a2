/**
 * Block device source (`/dev/...`), mounted read-only.
 */

import type { StagedScript } from '../types/script.js';
import type { CommandRunner, Transport } from '../types/transport.js';
import { mountSource, unmountPoint } from '../lib/mount.js';
import { stageFromDirectory } from './staging.js';

export class BlockDeviceTransport implements Transport {
  readonly kind = 'block';
  readonly mountable = true;

  constructor(
    private readonly device: string,
    private readonly mountPoint: string,
    private readonly run: CommandRunner
  ) {}

  describe(): string {
    return `block device ${this.device}`;
  }

  async mount(): Promise<void> {
    await mountSource(this.run, this.kind, this.device, ['-o', 'ro', this.device, this.mountPoint]);
  }

  async discover(suffixes: readonly string[], stagingDir: string): Promise<StagedScript[]> {
    return stageFromDirectory(this.mountPoint, suffixes, stagingDir);
  }

  async unmount(): Promise<void> {
    await unmountPoint(this.run, this.mountPoint);
  }
}
