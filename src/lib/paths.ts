/**
 * File locations used by a run.
 *
 * Everything the engine reads or writes is named here so a run can be pointed
 * at a private tree (CLI flags, tests) without touching the real system paths.
 */

import { join } from 'node:path';

export interface AutorunPaths {
  /** Effective configuration document written by the configuration provider */
  effectiveConfig: string;
  /** Boot command line */
  cmdline: string;
  /** Base working directory */
  baseDir: string;
  /** Per-script logs and exit-code sidecars */
  logDir: string;
  /** Staged script copies */
  tmpDir: string;
  /** Scratch mount point for device and share sources */
  mntDir: string;
  /** Single-instance lock file */
  lockFile: string;
  /** Sentinel whose presence turns the final keypress wait off */
  nowaitFile: string;
  /** Directories searched when no source is configured, in priority order */
  defaultDirs: readonly string[];
}

export const DEFAULT_EFFECTIVE_CONFIG = '/etc/sysrescue/sysrescue-effective-config.json';
export const DEFAULT_CMDLINE = '/proc/cmdline';
export const DEFAULT_BASE_DIR = '/var/autorun';
export const DEFAULT_LOCK_FILE = '/run/autorun.pid';
export const DEFAULT_NOWAIT_FILE = '/etc/ar_nowait';

export const DEFAULT_SOURCE_DIRS: readonly string[] = [
  '/run/archiso/bootmnt/autorun',
  '/run/archiso/bootmnt',
  '/run/archiso/copytoram/autorun',
  '/run/archiso/copytoram',
  '/var/autorun/cdrom',
  '/root',
  '/usr/share/sys.autorun',
];

/** Suffix of the exit-code sidecar written next to each log */
export const RETURN_FILE_SUFFIX = '.return';
/** Suffix of per-script log files */
export const LOG_FILE_SUFFIX = '.log';

/**
 * Builds the path set. Every location can be overridden; the log, staging
 * and mount directories default to children of the base directory.
 */
export function buildPaths(overrides: Partial<AutorunPaths> = {}): AutorunPaths {
  const baseDir = overrides.baseDir ?? DEFAULT_BASE_DIR;
  return {
    effectiveConfig: overrides.effectiveConfig ?? DEFAULT_EFFECTIVE_CONFIG,
    cmdline: overrides.cmdline ?? DEFAULT_CMDLINE,
    baseDir,
    logDir: overrides.logDir ?? join(baseDir, 'log'),
    tmpDir: overrides.tmpDir ?? join(baseDir, 'tmp'),
    mntDir: overrides.mntDir ?? join(baseDir, 'mnt'),
    lockFile: overrides.lockFile ?? DEFAULT_LOCK_FILE,
    nowaitFile: overrides.nowaitFile ?? DEFAULT_NOWAIT_FILE,
    defaultDirs: overrides.defaultDirs ?? DEFAULT_SOURCE_DIRS,
  };
}

export function logPathFor(logDir: string, baseName: string): string {
  return join(logDir, `${baseName}${LOG_FILE_SUFFIX}`);
}

export function returnPathFor(logDir: string, baseName: string): string {
  return join(logDir, `${baseName}${RETURN_FILE_SUFFIX}`);
}
