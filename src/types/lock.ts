/**
 * Session lock type definitions.
 */

/**
 * Outcome of running work under the session lock.
 */
export type LockedRun<T> = { acquired: false } | { acquired: true; value: T };
