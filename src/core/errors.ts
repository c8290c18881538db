import { FatalReason, FetchFailure } from '../types';

/**
 * A single HTTP/file request failed.
 * `kind` decides whether the connector retries it.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly kind: FetchFailure,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }

  static transient(message: string, status?: number): FetchError {
    return new FetchError(message, 'transient', status);
  }

  static permanent(message: string, status?: number): FetchError {
    return new FetchError(message, 'permanent', status);
  }
}

/**
 * Raw snapshots are write-once per (source_id, run_id)
 */
export class SnapshotExistsError extends Error {
  constructor(public readonly snapshotPath: string) {
    super(`Raw snapshot already exists: ${snapshotPath}`);
    this.name = 'SnapshotExistsError';
  }
}

/**
 * Run-level failure that no gate can recover from
 */
export class FatalPipelineError extends Error {
  constructor(
    public readonly reasons: FatalReason[],
    message?: string
  ) {
    super(message || `Pipeline failed: ${reasons.join(', ')}`);
    this.name = 'FatalPipelineError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Attempt to start (or restart) a run id that is already in use
 */
export class RunConflictError extends Error {
  constructor(public readonly runId: string, status: string) {
    super(`Run ${runId} already exists with status '${status}'. Start a new run with a new run id.`);
    this.name = 'RunConflictError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
