import { withIo } from "../core/errors.js";
import { computeDirectorySignature } from "../signature/signature.js";
import type { DependencySignatures } from "../types/lock-record.js";
import type { Signature } from "../types/signature.js";
import type { StageKind } from "../types/stage.js";
import type { LockStore, LockTarget } from "./lock-store.js";

/**
 * Per-stage view of the locking protocol. All operations are read-only.
 *
 * `dependencySignatures()` is computed from the dependencies' current
 * artifacts, never read back from their lock files.
 */
export interface LockManager extends LockTarget {
  readonly kind: StageKind;
  /** Instance name; the corpus is always "corpus". */
  readonly name: string;
  readonly dependencies: readonly LockManager[];
  dependencySignatures(): Promise<DependencySignatures>;
  signature(): Promise<Signature | null>;
  isLocked(): Promise<boolean>;
}

export type LockManagerContext = {
  store: LockStore;
  /** Data-file patterns per stage kind. */
  dataFiles: Readonly<Record<StageKind, readonly string[]>>;
};

export function stageLabel(kind: StageKind, name: string): string {
  return kind === "corpus" ? "corpus" : `${kind} '${name}'`;
}

/** Signature of the data files in a stage directory, optionally salted with a name. */
function dataSignature(ctx: LockManagerContext, stage: LockTarget & { kind: StageKind }, name?: string): Promise<Signature> {
  return withIo(stage.label, stage.dir, "signing data files", () =>
    computeDirectorySignature(
      stage.dir,
      { patterns: ctx.dataFiles[stage.kind], lockfileName: ctx.store.lockfileName },
      name === undefined ? {} : { name },
    ),
  );
}

export function createCorpusLock(ctx: LockManagerContext, dir: string): LockManager {
  const self: LockManager = {
    kind: "corpus",
    name: "corpus",
    label: stageLabel("corpus", "corpus"),
    dir,
    dependencies: [],
    dependencySignatures: async () => ({}),
    signature: () => dataSignature(ctx, self),
    isLocked: () => ctx.store.exists(self),
  };
  return self;
}

/** Sample signatures include the sample's name: equal content under two names is two samples. */
export function createSampleLock(ctx: LockManagerContext, corpus: LockManager, name: string, dir: string): LockManager {
  const self: LockManager = {
    kind: "sample",
    name,
    label: stageLabel("sample", name),
    dir,
    dependencies: [corpus],
    dependencySignatures: async () => ({ corpus: await dataSignature(ctx, corpus) }),
    signature: () => dataSignature(ctx, self, name),
    isLocked: () => ctx.store.exists(self),
  };
  return self;
}

export function createConfigLock(ctx: LockManagerContext, sample: LockManager, name: string, dir: string): LockManager {
  const self: LockManager = {
    kind: "config",
    name,
    label: stageLabel("config", name),
    dir,
    dependencies: [sample],
    dependencySignatures: async () => ({ sample: await dataSignature(ctx, sample) }),
    signature: () => dataSignature(ctx, self),
    isLocked: () => ctx.store.exists(self),
  };
  return self;
}

/** Experiments are terminal: nothing depends on them, so they carry no own signature. */
export function createExperimentLock(
  ctx: LockManagerContext,
  config: LockManager,
  sample: LockManager,
  name: string,
  dir: string,
): LockManager {
  const self: LockManager = {
    kind: "experiment",
    name,
    label: stageLabel("experiment", name),
    dir,
    dependencies: [config, sample],
    dependencySignatures: async () => ({
      config: await dataSignature(ctx, config),
      sample: await dataSignature(ctx, sample),
    }),
    signature: async () => null,
    isLocked: () => ctx.store.exists(self),
  };
  return self;
}
