/**
 * External mount/umount invocation.
 *
 * Commands run with argv arrays (no shell). Their stderr is captured so a
 * failed mount can be reported, stdout is discarded.
 */

import { spawn } from 'node:child_process';
import type { CommandResult, CommandRunner, TransportKind } from '../types/transport.js';

/**
 * Error thrown when a source cannot be mounted. Fatal for the run: there is
 * no fallback to another transport.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly transport: TransportKind,
    public readonly source: string,
    public readonly exitCode: number | null
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * Runs a command and resolves with its exit code and stderr. Never rejects:
 * a command that cannot start yields `exitCode: null` and `error`.
 */
export const runCommand: CommandRunner = (cmd, args) =>
  new Promise<CommandResult>((resolve) => {
    let stderr = '';
    let settled = false;
    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const child = spawn(cmd, args, {
      shell: false,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.once('error', (error: Error) => {
      finish({ exitCode: null, stderr, error: error.message });
    });

    child.once('close', (code: number | null) => {
      finish({ exitCode: code ?? 1, stderr, error: null });
    });
  });

/**
 * Describes a failed command for log lines.
 */
export function describeFailure(cmd: string, args: string[], result: CommandResult): string {
  const rendered = [cmd, ...args].join(' ');
  if (result.error !== null) {
    return `${rendered} could not start: ${result.error}`;
  }
  const detail = result.stderr.trim();
  return `${rendered} exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`;
}

/**
 * Mounts with `mount <args>`.
 *
 * @throws {TransportError} If mount fails or cannot start
 */
export async function mountSource(
  run: CommandRunner,
  transport: TransportKind,
  source: string,
  args: string[]
): Promise<void> {
  const result = await run('mount', args);
  if (result.exitCode !== 0) {
    throw new TransportError(
      `Failed to mount ${source}: ${describeFailure('mount', args, result)}`,
      transport,
      source,
      result.exitCode
    );
  }
}

/**
 * Unmounts a mount point. The result is logged, never checked.
 */
export async function unmountPoint(run: CommandRunner, mountPoint: string): Promise<void> {
  const result = await run('umount', [mountPoint]);
  if (result.exitCode !== 0) {
    console.warn(`[WARN] ${describeFailure('umount', [mountPoint], result)}`);
  }
}
