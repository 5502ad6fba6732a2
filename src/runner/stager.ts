/**
 * Post-processing of staged scripts before execution.
 *
 * Text scripts get their carriage returns stripped and a default shebang when
 * they have none. Native binaries are left alone. Nothing here can stop a
 * script from being attempted.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { StagedScript } from '../types/script.js';
import { errorMessage } from '../lib/fs.js';

/** Shebang prepended to text scripts that lack one */
export const DEFAULT_SHEBANG = '#!/bin/sh\n';

const ELF_MAGIC = Buffer.from([0x7f, 0x45, 0x4c, 0x46]);
const CARRIAGE_RETURN = 0x0d;

/**
 * What normalization did to one file.
 */
export interface StagingReport {
  baseName: string;
  binary: boolean;
  crStripped: boolean;
  shebangAdded: boolean;
  /** Warnings emitted for this file */
  warnings: string[];
  /** I/O error that stopped normalization, if any */
  error: string | null;
}

/**
 * Returns true if the content starts with the ELF magic number.
 */
export function isNativeBinary(content: Buffer): boolean {
  return content.length >= ELF_MAGIC.length && content.subarray(0, ELF_MAGIC.length).equals(ELF_MAGIC);
}

/**
 * Returns the content without any carriage-return byte.
 */
export function stripCarriageReturns(content: Buffer): Buffer {
  return Buffer.from(content.filter((byte) => byte !== CARRIAGE_RETURN));
}

function warn(report: StagingReport, message: string): void {
  report.warnings.push(message);
  console.warn(`[DEPRECATED] ${message}`);
}

/**
 * Normalizes a staged text script in place. Never throws.
 */
export async function normalizeScript(script: StagedScript): Promise<StagingReport> {
  const report: StagingReport = {
    baseName: script.baseName,
    binary: false,
    crStripped: false,
    shebangAdded: false,
    warnings: [],
    error: null,
  };

  try {
    const original = await readFile(script.localPath);
    if (isNativeBinary(original)) {
      report.binary = true;
      return report;
    }

    let content = stripCarriageReturns(original);
    if (content.length !== original.length) {
      report.crStripped = true;
      warn(
        report,
        `${script.baseName}: Windows line endings are deprecated, carriage returns have been removed`
      );
    }

    if (!content.subarray(0, 2).equals(Buffer.from('#!'))) {
      content = Buffer.concat([Buffer.from(DEFAULT_SHEBANG), content]);
      report.shebangAdded = true;
      warn(
        report,
        `${script.baseName}: scripts without a shebang are deprecated, '${DEFAULT_SHEBANG.trim()}' has been added`
      );
    }

    if (report.crStripped || report.shebangAdded) {
      await writeFile(script.localPath, content);
    }
  } catch (error) {
    report.error = errorMessage(error);
    console.warn(`[WARN] Could not normalize ${script.baseName}: ${report.error}`);
  }

  return report;
}
