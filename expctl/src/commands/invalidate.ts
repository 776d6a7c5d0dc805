import { invalidateStage } from "../core/invalidate.js";
import { requireStage } from "../lock/workspace.js";
import type { StageKind } from "../types/stage.js";
import { openContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type InvalidateResult = { ok: true; stage: string; removed: boolean } | CommandFailure;

export async function invalidate(opts: CommandOpts & { stage: StageKind }): Promise<InvalidateResult> {
  try {
    const { workspace, logger } = openContext(opts);
    const res = await invalidateStage(workspace.store, requireStage(workspace.locks, opts.stage), logger);
    return { ok: true, stage: res.stage, removed: res.removed };
  } catch (e) {
    return toFailure(e);
  }
}
