/**
 * Types for the effective configuration document and the autorun settings
 * derived from it.
 */

/**
 * Raw value of an option in the effective configuration document.
 *
 * The configuration provider writes booleans for recognized boot-line flags
 * (`y`, `yes`, `true`, ...) and the literal string for anything else, so every
 * option may arrive as a string.
 */
export type RawOptionValue = boolean | number | string;

/**
 * The `autorun` scope of the effective configuration document.
 */
export interface RawAutorunScope {
  ar_disable?: RawOptionValue;
  ar_nowait?: RawOptionValue;
  ar_nodel?: RawOptionValue;
  ar_ignorefail?: RawOptionValue;
  ar_attempts?: RawOptionValue;
  ar_source?: RawOptionValue;
  ar_suffixes?: RawOptionValue;
  [key: string]: unknown;
}

/**
 * Effective configuration document, as persisted by the configuration provider.
 * Only the `autorun` scope is read here; other scopes are ignored.
 */
export interface EffectiveConfigDocument {
  autorun: RawAutorunScope;
  [scope: string]: unknown;
}

/**
 * Autorun settings, parsed once at load time and never mutated afterwards.
 */
export interface AutorunConfig {
  /** Skip the whole run */
  readonly disabled: boolean;
  /** Do not wait for a keypress after scripts have run */
  readonly noWait: boolean;
  /** Keep staged copies after the run */
  readonly noDelete: boolean;
  /** Keep running the remaining scripts after a failure */
  readonly ignoreFailure: boolean;
  /** Number of fetch rounds for HTTP sources */
  readonly attempts: number;
  /** Where scripts come from: device path, nfs://, smb://, http(s):// URL, or empty */
  readonly source: string;
  /** Comma-separated suffix tokens, or "no"/empty for the bare name only */
  readonly suffixes: string;
}
