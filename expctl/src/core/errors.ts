import type { Signature } from "../types/signature.js";
import { shortSignature } from "../types/signature.js";

export type PipelineErrorCode =
  | "NOT_CACHED"
  | "STALE_DEPENDENCY"
  | "CORRUPT_CACHE"
  | "IO_ERROR"
  | "LOCKFILE_MALFORMED"
  | "WORK_FAILED"
  | "RUN_CANCELLED";

/**
 * Base class for every failure the locking protocol reports.
 * `stage` names the stage instance (e.g. "sample 'small'") the failure is about.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly stage: string;
  readonly hint?: string;

  protected constructor(stage: string, message: string, opts?: { hint?: string; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.hint = opts?.hint;
  }
}

/** No lock record: the stage (or one of its dependencies) has to run first. */
export class NotCachedError extends PipelineError {
  readonly code = "NOT_CACHED";

  constructor(stage: string, readonly missing: string) {
    super(
      stage,
      missing === stage
        ? `${stage} has no cached result`
        : `${stage}: dependency ${missing} has no cached result — run ${missing} first`,
      { hint: `run ${missing} first` },
    );
  }
}

export class StaleDependencyError extends PipelineError {
  readonly code = "STALE_DEPENDENCY";

  constructor(
    stage: string,
    readonly dependency: string,
    readonly recorded: Signature | null,
    readonly current: Signature | null,
  ) {
    super(
      stage,
      `${stage} is stale: dependency ${dependency} changed ` +
        `(recorded ${shortSignature(recorded)}, now ${shortSignature(current)})`,
      { hint: `re-run ${dependency}, or force a rebuild of ${stage}` },
    );
  }
}

/** A locked stage's artifacts no longer match its lock record. */
export class CorruptCacheError extends PipelineError {
  readonly code = "CORRUPT_CACHE";

  constructor(
    stage: string,
    readonly expected: Signature | null,
    readonly actual: Signature | null,
  ) {
    super(
      stage,
      `${stage} artifacts were modified outside the pipeline ` +
        `(locked ${shortSignature(expected)}, found ${shortSignature(actual)})`,
      { hint: `invalidate ${stage} and run it again` },
    );
  }
}

export class IOError extends PipelineError {
  readonly code: "IO_ERROR" | "LOCKFILE_MALFORMED";
  /** Set when the I/O failure happened while rolling back failed work. */
  readonly workError?: WorkExecutionError;

  constructor(
    stage: string,
    readonly path: string,
    message: string,
    opts?: { cause?: unknown; malformed?: boolean; workError?: WorkExecutionError },
  ) {
    super(stage, `${stage}: ${message}: ${path}`, {
      cause: opts?.cause,
      hint: opts?.malformed ? `inspect or delete ${path}` : undefined,
    });
    this.code = opts?.malformed ? "LOCKFILE_MALFORMED" : "IO_ERROR";
    this.workError = opts?.workError;
  }
}

/** The external stage work failed; the previous lock record was restored. */
export class WorkExecutionError extends PipelineError {
  readonly code = "WORK_FAILED";

  constructor(stage: string, cause: unknown) {
    super(stage, `${stage} failed: ${describeCause(cause)}`, { cause });
  }
}

/** The run was aborted during RUNNING; the lock record stays deleted. */
export class RunCancelledError extends PipelineError {
  readonly code = "RUN_CANCELLED";

  constructor(stage: string, cause: unknown) {
    super(stage, `${stage} was cancelled while running; it will rebuild on the next run`, { cause });
  }
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Wrap a filesystem call so failures surface as IOError for `stage`. */
export async function withIo<T>(stage: string, filePath: string, what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof PipelineError) throw e;
    throw new IOError(stage, filePath, `${what} failed (${describeCause(e)})`, { cause: e });
  }
}
