/**
 * Source resolution: classify the configured source, pick exactly one
 * transport and drive it through mount, discovery and unmount.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { AutorunConfig } from '../types/config.js';
import type { StagedScript } from '../types/script.js';
import type { CommandRunner, SourceLocation, Transport } from '../types/transport.js';
import type { AutorunPaths } from '../lib/paths.js';
import { runCommand } from '../lib/mount.js';
import { deriveSuffixList } from '../lib/suffixes.js';
import {
  BlockDeviceTransport,
  HttpFetchTransport,
  LocalDefaultsTransport,
  NetworkShareTransport,
  toNfsShare,
  toSmbShare,
} from '../transports/index.js';
import type { FetchFunction } from '../transports/index.js';

/** Pause between two HTTP attempts */
export const RETRY_DELAY_MS = 1000;

/**
 * Collaborators of the resolver. Everything but `paths` has a default.
 */
export interface ResolverDeps {
  paths: AutorunPaths;
  runCommand?: CommandRunner;
  fetch?: FetchFunction;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Classifies a source string by prefix. Empty or unrecognized sources use the
 * local default directories.
 *
 * @example
 * ```typescript
 * classifySource('smb://fileserver/rescue'); // { kind: 'smb', share: '//fileserver/rescue' }
 * ```
 */
export function classifySource(source: string): SourceLocation {
  const value = source.trim();
  if (value.startsWith('/dev/')) {
    return { kind: 'block', device: value };
  }
  if (value.startsWith('nfs://')) {
    return { kind: 'nfs', share: toNfsShare(value.slice('nfs://'.length)) };
  }
  if (value.startsWith('smb://')) {
    return { kind: 'smb', share: toSmbShare(value.slice('smb://'.length)) };
  }
  if (/^https?:\/\//.test(value)) {
    return { kind: 'http', url: value };
  }
  if (value !== '') {
    console.warn(`[WARN] Unrecognized autorun source '${value}', using default directories`);
  }
  return { kind: 'local' };
}

/**
 * Creates the transport for a classified source.
 */
export function createTransport(location: SourceLocation, deps: ResolverDeps): Transport {
  const run = deps.runCommand ?? runCommand;
  switch (location.kind) {
    case 'local':
      return new LocalDefaultsTransport(deps.paths.defaultDirs);
    case 'block':
      return new BlockDeviceTransport(location.device, deps.paths.mntDir, run);
    case 'nfs':
    case 'smb':
      return new NetworkShareTransport(location.kind, location.share, deps.paths.mntDir, run);
    case 'http':
      return new HttpFetchTransport(location.url, deps.fetch);
  }
}

/**
 * Discovers with retries: up to `attempts` rounds, one `sleep` between
 * rounds, stopping at the first round that stages anything. Running out of
 * attempts is not an error.
 */
export async function discoverWithRetry(
  transport: Transport,
  suffixes: readonly string[],
  stagingDir: string,
  attempts: number,
  sleep: (ms: number) => Promise<void>
): Promise<StagedScript[]> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    console.log(`[INFO] Fetching from ${transport.describe()} (attempt ${attempt}/${attempts})`);
    const staged = await transport.discover(suffixes, stagingDir);
    if (staged.length > 0) {
      return staged;
    }
    if (attempt < attempts) {
      await sleep(RETRY_DELAY_MS);
    }
  }
  console.log(`[INFO] Nothing found on ${transport.describe()} after ${attempts} attempt(s)`);
  return [];
}

/**
 * Stages the scripts of the configured source, in suffix order.
 *
 * Mountable transports are unmounted after discovery whatever its outcome;
 * a failed mount propagates and nothing is unmounted.
 *
 * @throws {TransportError} If a device or share cannot be mounted
 */
export async function resolveScripts(config: AutorunConfig, deps: ResolverDeps): Promise<StagedScript[]> {
  const transport = createTransport(classifySource(config.source), deps);
  const suffixes = deriveSuffixList(config.suffixes);
  const stagingDir = deps.paths.tmpDir;
  console.log(`[INFO] Looking for autorun scripts on ${transport.describe()}`);

  if (transport.kind === 'http') {
    return discoverWithRetry(transport, suffixes, stagingDir, config.attempts, deps.sleep ?? ((ms) => delay(ms)));
  }

  if (!transport.mountable) {
    return transport.discover(suffixes, stagingDir);
  }

  await transport.mount();
  try {
    return await transport.discover(suffixes, stagingDir);
  } finally {
    await transport.unmount();
  }
}
