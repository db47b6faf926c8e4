import type { StageName } from '../types/stage.js';

export type TrackerErrorCode =
  | 'MISSING_PREREQUISITE_STAGE'
  | 'HISTORY_STORE_CORRUPT'
  | 'AMBIGUOUS_RUN_STATE'
  | 'DELIVERY_WRITE_CONFLICT'
  | 'STORE_WRITE_CONFLICT'
  | 'DRY_RUN_WRITE_VIOLATION'
  | 'CONFIG_ERROR';

/**
 * Base class for every error the tracker raises on purpose.
 * `code` is stable and is what the CLI maps to an exit status.
 */
export abstract class TrackerError extends Error {
  abstract readonly code: TrackerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A stage was requested whose dependency chain is broken within the chosen run.
 */
export class MissingPrerequisiteStage extends TrackerError {
  readonly code = 'MISSING_PREREQUISITE_STAGE';

  constructor(
    readonly stage: StageName,
    readonly missing: StageName,
    readonly runDate: string | null
  ) {
    super(
      runDate
        ? `Cannot run "${stage}": run ${runDate} is missing prerequisite stage "${missing}"`
        : `Cannot run "${stage}": it would start a new run, which needs "${missing}" first`
    );
  }
}

export class HistoryStoreCorrupt extends TrackerError {
  readonly code = 'HISTORY_STORE_CORRUPT';

  constructor(
    readonly store: string,
    readonly path: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${store} at ${path} is unreadable: ${detail}`, options);
  }
}

export class AmbiguousRunState extends TrackerError {
  readonly code = 'AMBIGUOUS_RUN_STATE';

  constructor(readonly runDate: string, detail: string) {
    super(`Ambiguous run state for ${runDate}: ${detail}`);
  }
}

/**
 * Raised by the generic JSON store when the document changed on disk between
 * read and swap on every allowed attempt, or when another writer held the
 * store's lock file for longer than the store waits.
 */
export class StoreWriteConflict extends TrackerError {
  readonly code = 'STORE_WRITE_CONFLICT';

  constructor(
    readonly path: string,
    readonly attempts: number,
    detail?: string
  ) {
    super(`Concurrent write detected on ${path}${detail ? `: ${detail}` : ` after ${attempts} attempt(s)`}`);
  }
}

export class DeliveryWriteConflict extends TrackerError {
  readonly code = 'DELIVERY_WRITE_CONFLICT';

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Delivery history at ${path} was modified concurrently; delivery records not written`, options);
  }
}

export class DryRunWriteViolation extends TrackerError {
  readonly code = 'DRY_RUN_WRITE_VIOLATION';

  constructor(operation: string) {
    super(`Refusing ${operation}: delivery history is opened read-only for a dry run`);
  }
}

export class ConfigError extends TrackerError {
  readonly code = 'CONFIG_ERROR';
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
