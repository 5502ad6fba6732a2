/**
 * Suffix list derivation.
 *
 * Candidate script names are `autorun` followed by each suffix, searched in
 * the order the suffixes are configured.
 */

/** Base name shared by every candidate script */
export const SCRIPT_BASE_NAME = 'autorun';

/** `ar_suffixes` value that disables suffixed names */
export const SUFFIXES_DISABLED = 'no';

/**
 * Derives the ordered suffix list. The bare name (empty suffix) always comes
 * first; duplicates are kept.
 *
 * @example
 * ```typescript
 * deriveSuffixList('1,3,5'); // ['', '1', '3', '5']
 * deriveSuffixList('no');    // ['']
 * ```
 */
export function deriveSuffixList(suffixes: string): readonly string[] {
  const trimmed = suffixes.trim();
  if (trimmed === '' || trimmed === SUFFIXES_DISABLED) {
    return [''];
  }
  const tokens = trimmed
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
  return ['', ...tokens];
}

/**
 * Candidate file name for a suffix.
 */
export function candidateName(suffix: string): string {
  return `${SCRIPT_BASE_NAME}${suffix}`;
}
