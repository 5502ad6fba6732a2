/**
 * Boot command line access.
 *
 * Only the legacy `autoruns=` token is read here. Every other boot option has
 * already been folded into the effective configuration upstream.
 */

import { readFile } from 'node:fs/promises';
import { errorMessage, isErrnoCode } from './fs.js';

/** Legacy token that overrides `ar_suffixes` */
export const LEGACY_SUFFIXES_OPTION = 'autoruns';

/**
 * Reads the boot command line. A missing or unreadable file counts as an
 * empty command line.
 */
export async function readCmdline(cmdlinePath: string): Promise<string> {
  try {
    return await readFile(cmdlinePath, 'utf-8');
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) {
      console.warn(`[WARN] Cannot read boot command line ${cmdlinePath}: ${errorMessage(error)}`);
    }
    return '';
  }
}

/**
 * Returns the value of the last `name=<value>` token, or null if none.
 *
 * @example
 * ```typescript
 * readCmdlineOption('quiet autoruns=0,2 rw', 'autoruns'); // '0,2'
 * ```
 */
export function readCmdlineOption(cmdline: string, name: string): string | null {
  const prefix = `${name}=`;
  let value: string | null = null;
  for (const token of cmdline.split(/\s+/)) {
    if (token.startsWith(prefix) && token.length > prefix.length) {
      value = token.slice(prefix.length);
    }
  }
  return value;
}
