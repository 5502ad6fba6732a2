/**
 * Transport capability shared by every script source.
 */

import type { StagedScript } from './script.js';

export type TransportKind = 'local' | 'block' | 'nfs' | 'smb' | 'http';

/**
 * Classified form of the configured source string.
 */
export type SourceLocation =
  | { kind: 'local' }
  | { kind: 'block'; device: string }
  | { kind: 'nfs'; share: string }
  | { kind: 'smb'; share: string }
  | { kind: 'http'; url: string };

/**
 * A source-specific strategy for staging candidate scripts.
 *
 * `mount()` and `unmount()` are no-ops for transports that need no mount.
 * `discover()` stages at most one file per suffix, in suffix order.
 */
export interface Transport {
  readonly kind: TransportKind;
  /** Human-readable description for log lines */
  describe(): string;
  /** Whether mount()/unmount() do anything */
  readonly mountable: boolean;
  mount(): Promise<void>;
  discover(suffixes: readonly string[], stagingDir: string): Promise<StagedScript[]>;
  unmount(): Promise<void>;
}

/**
 * Result of an external command such as mount or umount.
 */
export interface CommandResult {
  /** Exit code, or null when the command could not be started */
  exitCode: number | null;
  stderr: string;
  /** Spawn error message when the command could not be started */
  error: string | null;
}

/**
 * Runs an external command and collects its result.
 */
export type CommandRunner = (cmd: string, args: string[]) => Promise<CommandResult>;
