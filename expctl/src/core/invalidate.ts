import type { LockManager } from "../lock/managers.js";
import type { LockStore } from "../lock/lock-store.js";
import { diag, silentLogger, type Logger } from "../log/logger.js";

export type InvalidateResult = {
  stage: string;
  /** False when there was no lock record to remove. */
  removed: boolean;
};

/**
 * Force-invalidate: drop a stage's lock record so its next run rebuilds.
 * Downstream stages become stale once the rebuilt stage's signature changes.
 */
export async function invalidateStage(
  store: LockStore,
  stage: LockManager,
  logger: Logger = silentLogger,
): Promise<InvalidateResult> {
  const removed = await store.discard(stage);
  logger.emit(
    diag(
      "info",
      removed ? "STAGE_INVALIDATED" : "STAGE_NOT_LOCKED",
      removed ? `${stage.label} invalidated` : `${stage.label} had no lock record`,
      { stage: stage.label },
    ),
  );
  return { stage: stage.label, removed };
}
