import { PipelineRunner, type StageWork } from "../core/pipeline-runner.js";
import type { RunState } from "../core/state-machine.js";
import { requireStage } from "../lock/workspace.js";
import type { LockRecord } from "../types/lock-record.js";
import type { StageKind } from "../types/stage.js";
import { createCommandWork } from "../work/command-work.js";
import { openContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type RunOpts = CommandOpts & {
  stage: StageKind;
  force?: boolean;
  signal?: AbortSignal;
  /** Replaces the configured command (used by embedders and tests). */
  work?: StageWork;
};

export type RunCommandResult =
  | { ok: true; stage: string; outcome: "cached" | "committed"; path: RunState[]; record: LockRecord }
  | CommandFailure;

/** Run one stage through the locking protocol. */
export async function run(opts: RunOpts): Promise<RunCommandResult> {
  try {
    const { config, workspace, logger } = openContext(opts);
    const target = requireStage(workspace.locks, opts.stage);
    const work =
      opts.work ??
      createCommandWork({ config, root: workspace.root, locks: workspace.locks, logger, env: opts.env });

    const runner = new PipelineRunner(workspace.store, logger);
    const res = await runner.run(target, work, {
      force: opts.force,
      verifyIntegrity: config.verify_integrity,
      signal: opts.signal,
    });
    return { ok: true, stage: res.stage, outcome: res.outcome, path: res.path, record: res.record };
  } catch (e) {
    return toFailure(e);
  }
}
