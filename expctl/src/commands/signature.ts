import { requireStage } from "../lock/workspace.js";
import type { DependencySignatures, LockRecord } from "../types/lock-record.js";
import type { Signature } from "../types/signature.js";
import type { StageKind } from "../types/stage.js";
import { openContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type SignatureResult =
  | {
      ok: true;
      stage: string;
      locked: boolean;
      signature: Signature | null;
      dependencySignatures: DependencySignatures;
      record: LockRecord | null;
    }
  | CommandFailure;

/** Live signatures of a stage next to what its lock file recorded. */
export async function signature(opts: CommandOpts & { stage: StageKind }): Promise<SignatureResult> {
  try {
    const { workspace } = openContext(opts);
    const stage = requireStage(workspace.locks, opts.stage);
    const record = await workspace.store.load(stage);
    return {
      ok: true,
      stage: stage.label,
      locked: record !== null,
      signature: await stage.signature(),
      dependencySignatures: await stage.dependencySignatures(),
      record,
    };
  } catch (e) {
    return toFailure(e);
  }
}
