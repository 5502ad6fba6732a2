/**
 * Staged script and execution record types.
 */

/**
 * A candidate file copied or fetched into the staging directory.
 */
export interface StagedScript {
  /** Where the file was found (path on the source, or URL) */
  sourcePath: string;
  /** Path of the private copy under the staging directory */
  localPath: string;
  /** File name, `autorun` followed by the suffix */
  baseName: string;
}

/**
 * Outcome of one executed script.
 */
export interface ExecutionRecord {
  baseName: string;
  exitCode: number;
  /** Log file holding the forwarded output */
  logPath: string;
  /** True when the sequence stopped right after this script */
  aborted: boolean;
}

/**
 * Result of a sequential run.
 */
export interface RunSummary {
  records: ExecutionRecord[];
  /** Number of scripts that exited non-zero */
  failures: number;
  /** Signal that interrupted the run, if any */
  interrupted: NodeJS.Signals | null;
}
