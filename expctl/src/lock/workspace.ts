import path from "node:path";
import type { ExpctlConfig } from "../types/config.js";
import type { StageKind, StageSelection } from "../types/stage.js";
import { LockStore } from "./lock-store.js";
import {
  createConfigLock,
  createCorpusLock,
  createExperimentLock,
  createSampleLock,
  type LockManager,
  type LockManagerContext,
} from "./managers.js";

export type StageLocks = {
  corpus: LockManager;
  sample?: LockManager;
  config?: LockManager;
  experiment?: LockManager;
};

export type Workspace = {
  root: string;
  store: LockStore;
  locks: StageLocks;
};

const NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Stage instance names become directory names; keep them to one safe path segment. */
export function assertStageName(kind: StageKind, name: string): void {
  if (!NAME_RE.test(name) || name === "." || name === "..") {
    throw new Error(`Invalid ${kind} name: ${JSON.stringify(name)} (letters, digits, ".", "_" and "-" only)`);
  }
}

/**
 * Wire up the lock managers for one selection. A config needs its sample and
 * an experiment needs both, so the selection must name them.
 */
export function openWorkspace(config: ExpctlConfig, selection: StageSelection, cwd: string = process.cwd()): Workspace {
  const root = path.resolve(cwd, config.workspace_root);
  const store = new LockStore({ lockfileName: config.lockfile_name });
  const ctx: LockManagerContext = { store, dataFiles: config.data_files };

  const corpus = createCorpusLock(ctx, path.join(root, config.layout.corpus));
  const locks: StageLocks = { corpus };

  if (selection.sample !== undefined) {
    assertStageName("sample", selection.sample);
    locks.sample = createSampleLock(ctx, corpus, selection.sample, path.join(root, config.layout.samples, selection.sample));
  }

  if (selection.config !== undefined) {
    assertStageName("config", selection.config);
    if (!locks.sample) throw new Error("A config is built from a sample: pass --sample as well");
    locks.config = createConfigLock(ctx, locks.sample, selection.config, path.join(root, config.layout.configs, selection.config));
  }

  if (selection.experiment !== undefined) {
    assertStageName("experiment", selection.experiment);
    if (!locks.sample || !locks.config) {
      throw new Error("An experiment runs a config over a sample: pass --sample and --config as well");
    }
    locks.experiment = createExperimentLock(
      ctx,
      locks.config,
      locks.sample,
      selection.experiment,
      path.join(root, config.layout.experiments, selection.experiment),
    );
  }

  return { root, store, locks };
}

/** The lock manager for `kind`, or an error naming the missing selection flag. */
export function requireStage(locks: StageLocks, kind: StageKind): LockManager {
  const lock = locks[kind];
  if (!lock) throw new Error(`No ${kind} selected: pass --${kind} <name>`);
  return lock;
}

/** Selected stages in dependency order. */
export function selectedStages(locks: StageLocks): LockManager[] {
  const out: LockManager[] = [locks.corpus];
  if (locks.sample) out.push(locks.sample);
  if (locks.config) out.push(locks.config);
  if (locks.experiment) out.push(locks.experiment);
  return out;
}
