import { buildPaths } from '../lib/paths.js';
import type { AutorunPaths } from '../lib/paths.js';
import { runAutorun } from '../runner/index.js';

// Must stay a type alias: commander's opts<T>() needs an index-signature-compatible type
export type RunOptions = {
  config?: string;
  cmdline?: string;
  baseDir?: string;
  lockFile?: string;
};

export function pathsFromOptions(options: RunOptions): AutorunPaths {
  return buildPaths({
    effectiveConfig: options.config,
    cmdline: options.cmdline,
    baseDir: options.baseDir,
    lockFile: options.lockFile,
  });
}

export async function runAutorunCommand(options: RunOptions): Promise<number> {
  return runAutorun({ paths: pathsFromOptions(options) });
}
