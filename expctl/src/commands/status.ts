import { inspectPipeline, type StageStatus } from "../core/pipeline-status.js";
import { selectedStages } from "../lock/workspace.js";
import { openContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type StatusResult = { ok: true; stages: StageStatus[] } | CommandFailure;

/**
 * Classify the corpus and every selected stage without changing anything.
 */
export async function status(opts: CommandOpts): Promise<StatusResult> {
  try {
    const { config, workspace } = openContext(opts);
    const stages = await inspectPipeline(workspace.store, selectedStages(workspace.locks), {
      verifyIntegrity: config.verify_integrity,
    });
    return { ok: true, stages };
  } catch (e) {
    return toFailure(e);
  }
}

export function formatStatusLine(s: StageStatus): string {
  const deps = s.staleDependencies.length > 0 ? ` (changed: ${s.staleDependencies.join(", ")})` : "";
  const reason = s.reason ? ` — ${s.reason}` : "";
  return `${s.label.padEnd(28)} ${s.health.padEnd(10)}${deps}${reason}`;
}
