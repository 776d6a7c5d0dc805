import type { LockManager } from "../lock/managers.js";
import type { LockStore } from "../lock/lock-store.js";
import { diag, silentLogger, type Logger } from "../log/logger.js";
import type { CheckedOutRecord, DependencySignatures, LockRecord } from "../types/lock-record.js";
import { isDependencyName, type DependencyName } from "../types/stage.js";
import { shortSignature, type Signature } from "../types/signature.js";
import { compareCodeUnits } from "../signature/data-files.js";
import {
  CorruptCacheError,
  IOError,
  NotCachedError,
  RunCancelledError,
  StaleDependencyError,
  WorkExecutionError,
  describeCause,
} from "./errors.js";
import { RunStateTracker, type RunEvent, type RunState } from "./state-machine.js";

/**
 * The stage's actual work (running the external tool). Rejects on failure.
 * Timeouts belong to the implementation; `signal` reports caller cancellation.
 */
export type StageWork = (stageDir: string, ctx: { stage: LockManager; signal?: AbortSignal }) => Promise<void>;

export type CheckOptions = {
  /** Compare locked stages' live signatures with their recorded ones. Default true. */
  verifyIntegrity?: boolean;
};

export type RunStageOptions = CheckOptions & {
  /** Rebuild even when the cache is valid or stale. Dependencies must still be locked. */
  force?: boolean;
  signal?: AbortSignal;
};

export type DependencyMismatch = {
  dependency: DependencyName;
  recorded: Signature | null;
  current: Signature | null;
};

export type CheckOutcome =
  | { status: "not_cached"; live: DependencySignatures }
  | { status: "valid"; live: DependencySignatures; record: LockRecord }
  | { status: "stale"; live: DependencySignatures; record: LockRecord; mismatches: DependencyMismatch[] };

export type RunStageResult = {
  stage: string;
  outcome: "cached" | "committed";
  record: LockRecord;
  /** States visited, e.g. CHECKING → NOT_CACHED → INVALIDATED → RUNNING → COMMITTED. */
  path: RunState[];
};

/**
 * Pipeline Runner — drives one stage through
 * verify → invalidate → execute → commit/rollback.
 *
 * Ordering guarantees: the lock record is durably deleted before the work
 * starts, and the new (or restored) record is durable before `run` settles.
 */
export class PipelineRunner {
  constructor(
    private readonly store: LockStore,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * CHECKING phase only: classify the target without changing anything.
   * Throws NotCachedError if a dependency is not locked, and
   * CorruptCacheError if a dependency's artifacts no longer match its record.
   */
  async check(target: LockManager, opts: CheckOptions = {}): Promise<CheckOutcome> {
    const verifyIntegrity = opts.verifyIntegrity ?? true;

    for (const dep of target.dependencies) {
      if (!(await dep.isLocked())) {
        throw new NotCachedError(target.label, dep.label);
      }
      if (verifyIntegrity) {
        await this.verifyOwnSignature(dep);
      }
    }

    const live = await target.dependencySignatures();
    const record = await this.store.load(target);
    if (!record) {
      return { status: "not_cached", live };
    }

    const mismatches = compareDependencySignatures(record.dependencySignatures, live);
    if (mismatches.length > 0) {
      return { status: "stale", live, record, mismatches };
    }
    return { status: "valid", live, record };
  }

  async run(target: LockManager, work: StageWork, opts: RunStageOptions = {}): Promise<RunStageResult> {
    const verifyIntegrity = opts.verifyIntegrity ?? true;
    const tracker = new RunStateTracker((to, from) => {
      this.logger.emit(
        diag("info", "RUN_STATE", `${target.label}: ${from} → ${to}`, { stage: target.label, details: { from, to } }),
      );
    });

    const checked = await this.check(target, { verifyIntegrity });
    let invalidateBy: RunEvent = "invalidated";

    switch (checked.status) {
      case "not_cached":
        tracker.apply("not_locked");
        break;

      case "valid":
        tracker.apply("dependencies_match");
        if (!opts.force) {
          if (verifyIntegrity) {
            await this.verifyOwnSignature(target, checked.record);
          }
          tracker.apply("cache_accepted");
          this.logger.emit(diag("info", "CACHE_HIT", `${target.label} is up to date`, { stage: target.label }));
          return { stage: target.label, outcome: "cached", record: checked.record, path: tracker.path };
        }
        invalidateBy = "forced";
        break;

      case "stale": {
        tracker.apply("dependencies_changed");
        if (!opts.force) {
          const first = checked.mismatches[0];
          const err = new StaleDependencyError(target.label, first.dependency, first.recorded, first.current);
          this.logger.emit(
            diag("error", err.code, err.message, {
              stage: target.label,
              details: { dependencies: checked.mismatches.map((m) => m.dependency), hint: err.hint },
            }),
          );
          throw err;
        }
        invalidateBy = "forced";
        break;
      }
    }

    const previous = await this.store.delete(target);
    tracker.apply(invalidateBy);

    tracker.apply("work_started");
    try {
      await work(target.dir, { stage: target, signal: opts.signal });
    } catch (cause) {
      if (opts.signal?.aborted) {
        const err = new RunCancelledError(target.label, cause);
        this.logger.emit(diag("warn", err.code, err.message, { stage: target.label }));
        throw err;
      }

      tracker.apply("work_failed");
      const err = new WorkExecutionError(target.label, cause);
      this.logger.emit(
        diag("error", err.code, err.message, {
          stage: target.label,
          details: { hadPreviousRecord: previous !== null },
        }),
      );
      if (previous) {
        await this.rollback(target, previous, err);
      }
      throw err;
    }

    const record: LockRecord = {
      ownSignature: await target.signature(),
      dependencySignatures: checked.live,
    };
    await this.store.save(target, record);
    tracker.apply("work_succeeded");

    this.logger.emit(
      diag("info", "STAGE_LOCKED", `${target.label} locked (${shortSignature(record.ownSignature)})`, {
        stage: target.label,
        details: { ownSignature: record.ownSignature, dependencySignatures: record.dependencySignatures },
      }),
    );
    return { stage: target.label, outcome: "committed", record, path: tracker.path };
  }

  /** Put the previous record back; a failure here still reports the work failure. */
  private async rollback(
    target: LockManager,
    previous: CheckedOutRecord,
    workError: WorkExecutionError,
  ): Promise<void> {
    try {
      await this.store.restore(target, previous);
    } catch (restoreError) {
      const detail = restoreError instanceof IOError ? describeCause(restoreError.cause) : describeCause(restoreError);
      const err = new IOError(
        target.label,
        this.store.pathFor(target),
        `work failed (${describeCause(workError.cause)}) and restoring the previous lock file failed (${detail})`,
        { cause: restoreError, workError },
      );
      this.logger.emit(diag("error", "ROLLBACK_FAILED", err.message, { stage: target.label }));
      throw err;
    }
  }

  /** A locked stage whose live signature differs from its record was changed out of band. */
  private async verifyOwnSignature(stage: LockManager, known?: LockRecord): Promise<void> {
    const record = known ?? (await this.store.load(stage));
    if (!record) {
      throw new NotCachedError(stage.label, stage.label);
    }
    const actual = await stage.signature();
    if (actual === null) return;
    if (actual !== record.ownSignature) {
      const err = new CorruptCacheError(stage.label, record.ownSignature, actual);
      this.logger.emit(diag("error", err.code, err.message, { stage: stage.label, details: { hint: err.hint } }));
      throw err;
    }
  }
}

/**
 * Exact key-by-key comparison in both directions; a key present on only one
 * side is a mismatch. Sorted by dependency name.
 */
export function compareDependencySignatures(
  recorded: Readonly<DependencySignatures>,
  live: Readonly<DependencySignatures>,
): DependencyMismatch[] {
  const names = [...new Set([...Object.keys(recorded), ...Object.keys(live)])].sort(compareCodeUnits);
  const out: DependencyMismatch[] = [];
  for (const name of names) {
    if (!isDependencyName(name)) continue;
    const r = recorded[name] ?? null;
    const c = live[name] ?? null;
    if (r !== c) out.push({ dependency: name, recorded: r, current: c });
  }
  return out;
}
