import type { LockManager } from "../lock/managers.js";
import type { LockStore } from "../lock/lock-store.js";
import { isPipelineError } from "./errors.js";
import { PipelineRunner, type CheckOptions } from "./pipeline-runner.js";
import type { DependencyName, StageKind } from "../types/stage.js";

export type StageHealth = "valid" | "not_cached" | "stale" | "blocked" | "corrupt" | "error";

export type StageStatus = {
  kind: StageKind;
  name: string;
  label: string;
  dir: string;
  locked: boolean;
  health: StageHealth;
  staleDependencies: DependencyName[];
  /** Why the stage is blocked, corrupt or unreadable. */
  reason?: string;
  hint?: string;
};

/**
 * Read-only CHECKING pass over a list of stages (dependency order).
 * Each stage is classified on its own; one failing stage does not stop the rest.
 */
export async function inspectPipeline(
  store: LockStore,
  stages: readonly LockManager[],
  opts: CheckOptions = {},
): Promise<StageStatus[]> {
  const runner = new PipelineRunner(store);
  const out: StageStatus[] = [];

  for (const stage of stages) {
    const base: Pick<StageStatus, "kind" | "name" | "label" | "dir" | "staleDependencies"> = {
      kind: stage.kind,
      name: stage.name,
      label: stage.label,
      dir: stage.dir,
      staleDependencies: [],
    };
    let locked = false;

    try {
      locked = await stage.isLocked();
      const checked = await runner.check(stage, opts);
      if (checked.status === "not_cached") {
        out.push({ ...base, locked, health: "not_cached" });
      } else if (checked.status === "stale") {
        out.push({
          ...base,
          locked,
          health: "stale",
          staleDependencies: checked.mismatches.map((m) => m.dependency),
          hint: `re-run ${checked.mismatches.map((m) => m.dependency).join(", ")}, or force a rebuild of ${stage.label}`,
        });
      } else if (opts.verifyIntegrity ?? true) {
        const actual = await stage.signature();
        const corrupt = actual !== null && actual !== checked.record.ownSignature;
        out.push(
          corrupt
            ? {
                ...base,
                locked,
                health: "corrupt",
                reason: `${stage.label} artifacts were modified outside the pipeline`,
                hint: `invalidate ${stage.label} and run it again`,
              }
            : { ...base, locked, health: "valid" },
        );
      } else {
        out.push({ ...base, locked, health: "valid" });
      }
    } catch (e) {
      if (!isPipelineError(e)) throw e;
      const health: StageHealth = e.code === "NOT_CACHED" || e.code === "CORRUPT_CACHE" ? "blocked" : "error";
      out.push({ ...base, locked, health, reason: e.message, hint: e.hint });
    }
  }

  return out;
}
