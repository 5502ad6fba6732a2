/**
 * Runner module exports.
 */

export { runAutorun, exitCodeFor, EXIT_FATAL } from './engine.js';
export type { EngineOptions } from './engine.js';
export { resolveScripts, classifySource, createTransport, discoverWithRetry, RETRY_DELAY_MS } from './resolver.js';
export type { ResolverDeps } from './resolver.js';
export { normalizeScript, isNativeBinary, stripCarriageReturns, DEFAULT_SHEBANG } from './stager.js';
export type { StagingReport } from './stager.js';
export { runScripts, executeScript, exitCodeForSignal, EXIT_NOT_FOUND, EXIT_CANNOT_EXECUTE } from './executor.js';
export type { ExecutorOptions } from './executor.js';
