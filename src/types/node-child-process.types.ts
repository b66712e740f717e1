/**
 * Shape of the error thrown by `execFileSync` when the child exits with a non-zero status.
 */
export interface ExecSyncError extends Error {
  /**
   * The exit code of the subprocess, or null if the subprocess terminated due to a signal.
   */
  status: number | null;

  /**
   * Captured standard error of the subprocess.
   */
  stderr: Buffer | string;
}
