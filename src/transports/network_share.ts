/**
 * Network share sources: NFS (`nfs://host/path`) and SMB (`smb://host/path`).
 */

import type { StagedScript } from '../types/script.js';
import type { CommandRunner, Transport } from '../types/transport.js';
import { mountSource, unmountPoint } from '../lib/mount.js';
import { stageFromDirectory } from './staging.js';

export type ShareProtocol = 'nfs' | 'smb';

/**
 * Converts the part after `nfs://` to the `host:/path` form mount expects.
 * An explicit `host:/path` is kept as is.
 *
 * @example
 * ```typescript
 * toNfsShare('server/exports/autorun'); // 'server:/exports/autorun'
 * ```
 */
export function toNfsShare(location: string): string {
  if (location.includes(':')) {
    return location;
  }
  const slash = location.indexOf('/');
  if (slash < 0) {
    return `${location}:/`;
  }
  return `${location.slice(0, slash)}:${location.slice(slash)}`;
}

/**
 * Converts the part after `smb://` to a `//host/path` UNC share.
 */
export function toSmbShare(location: string): string {
  return `//${location.replace(/^\/+/, '')}`;
}

/**
 * Builds the mount arguments for a share.
 */
export function shareMountArgs(protocol: ShareProtocol, share: string, mountPoint: string): string[] {
  if (protocol === 'nfs') {
    return ['-t', 'nfs', '-o', 'nolock', share, mountPoint];
  }
  return ['-t', 'cifs', share, mountPoint];
}

export class NetworkShareTransport implements Transport {
  readonly mountable = true;

  constructor(
    readonly kind: ShareProtocol,
    private readonly share: string,
    private readonly mountPoint: string,
    private readonly run: CommandRunner
  ) {}

  describe(): string {
    return `${this.kind} share ${this.share}`;
  }

  async mount(): Promise<void> {
    await mountSource(this.run, this.kind, this.share, shareMountArgs(this.kind, this.share, this.mountPoint));
  }

  async discover(suffixes: readonly string[], stagingDir: string): Promise<StagedScript[]> {
    return stageFromDirectory(this.mountPoint, suffixes, stagingDir);
  }

  async unmount(): Promise<void> {
    await unmountPoint(this.run, this.mountPoint);
  }
}
