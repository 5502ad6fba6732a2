/**
 * Configuration loading and parsing.
 *
 * Reads the `autorun` scope of the effective configuration document, parses
 * every option into its proper type and applies the legacy `autoruns=` boot
 * option. The result is frozen; later overrides return new values.
 */

import type { AutorunConfig, EffectiveConfigDocument, RawOptionValue } from '../types/config.js';
import { AtomicFsError, errorMessage, isErrnoCode, readJsonFile } from './fs.js';
import { EFFECTIVE_CONFIG_SCHEMA, loadSchema, schemaPath, validateWithSchema } from './schema.js';
import { LEGACY_SUFFIXES_OPTION, readCmdline, readCmdlineOption } from './cmdline.js';

export type ConfigErrorKind = 'missing' | 'invalid';

/**
 * Error thrown when the effective configuration cannot be used.
 * Both kinds are fatal for the run.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly kind: ConfigErrorKind,
    public readonly configPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Values used for options absent from the document.
 */
export const DEFAULT_AUTORUN_CONFIG: AutorunConfig = Object.freeze({
  disabled: false,
  noWait: false,
  noDelete: false,
  ignoreFailure: false,
  attempts: 1,
  source: '',
  suffixes: '0,1,2,3,4,5,6,7,8,9,A,B,C,D,E,F',
});

const TRUE_WORDS = new Set(['y', 'yes', 'true']);
const FALSE_WORDS = new Set(['n', 'no', 'false']);

/**
 * Parses a boolean option. Strings other than y/yes/true/n/no/false are not a
 * boolean override and yield null.
 */
export function parseBooleanOption(value: RawOptionValue): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return null;
}

/**
 * Parses a non-negative integer option given as a number or numeric string.
 */
export function parseCountOption(value: RawOptionValue): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

function parseStringOption(value: RawOptionValue): string | null {
  return typeof value === 'string' ? value.trim() : null;
}

function pick<T>(
  key: string,
  raw: RawOptionValue | undefined,
  parse: (value: RawOptionValue) => T | null,
  fallback: T
): T {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = parse(raw);
  if (parsed === null) {
    console.warn(`[WARN] Ignoring unrecognized value ${JSON.stringify(raw)} for option '${key}'`);
    return fallback;
  }
  return parsed;
}

/**
 * Builds a frozen AutorunConfig from a validated document.
 */
export function parseAutorunConfig(document: EffectiveConfigDocument): AutorunConfig {
  const scope = document.autorun;
  const defaults = DEFAULT_AUTORUN_CONFIG;
  return Object.freeze({
    disabled: pick('ar_disable', scope.ar_disable, parseBooleanOption, defaults.disabled),
    noWait: pick('ar_nowait', scope.ar_nowait, parseBooleanOption, defaults.noWait),
    noDelete: pick('ar_nodel', scope.ar_nodel, parseBooleanOption, defaults.noDelete),
    ignoreFailure: pick('ar_ignorefail', scope.ar_ignorefail, parseBooleanOption, defaults.ignoreFailure),
    attempts: pick('ar_attempts', scope.ar_attempts, parseCountOption, defaults.attempts),
    source: pick('ar_source', scope.ar_source, parseStringOption, defaults.source),
    suffixes: pick('ar_suffixes', scope.ar_suffixes, parseStringOption, defaults.suffixes),
  });
}

/**
 * Returns a config with `suffixes` replaced by the legacy `autoruns=` boot
 * option when present, or the same config otherwise.
 */
export function applyLegacySuffixOverride(config: AutorunConfig, cmdline: string): AutorunConfig {
  const value = readCmdlineOption(cmdline, LEGACY_SUFFIXES_OPTION);
  if (value === null) {
    return config;
  }
  console.log(`[INFO] Legacy option '${LEGACY_SUFFIXES_OPTION}=${value}' overrides ar_suffixes`);
  return Object.freeze({ ...config, suffixes: value });
}

/**
 * Reads and validates the effective configuration document.
 *
 * @throws {ConfigError} kind 'missing' if the file does not exist, 'invalid'
 *   if it cannot be read, parsed or validated
 */
export async function readEffectiveConfig(configPath: string): Promise<EffectiveConfigDocument> {
  let raw: unknown;
  try {
    raw = await readJsonFile(configPath);
  } catch (error) {
    if (error instanceof AtomicFsError && isErrnoCode(error.cause, 'ENOENT')) {
      throw new ConfigError(
        `Effective configuration not found at ${configPath}`,
        'missing',
        configPath,
        { cause: error }
      );
    }
    throw new ConfigError(
      `Failed to read effective configuration: ${errorMessage(error)}`,
      'invalid',
      configPath,
      { cause: error }
    );
  }

  const schema = await loadSchema(schemaPath(EFFECTIVE_CONFIG_SCHEMA));
  const result = validateWithSchema<EffectiveConfigDocument>(raw, schema);
  if (!result.valid || result.data === null) {
    throw new ConfigError(
      `Invalid effective configuration: ${result.errors.join('; ')}`,
      'invalid',
      configPath
    );
  }
  return result.data;
}

/**
 * Loads the autorun configuration: document, parsing, then the legacy
 * boot-line override.
 *
 * @param configPath - Effective configuration document
 * @param cmdlinePath - Boot command line file
 * @throws {ConfigError} If the document is missing or invalid
 *
 * @example
 * ```typescript
 * const config = await loadAutorunConfig(
 *   '/etc/sysrescue/sysrescue-effective-config.json',
 *   '/proc/cmdline'
 * );
 * ```
 */
export async function loadAutorunConfig(configPath: string, cmdlinePath: string): Promise<AutorunConfig> {
  const document = await readEffectiveConfig(configPath);
  const config = parseAutorunConfig(document);
  return applyLegacySuffixOverride(config, await readCmdline(cmdlinePath));
}
