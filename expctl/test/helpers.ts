import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "../src/config/defaults.js";
import { LockStore } from "../src/lock/lock-store.js";
import {
  createConfigLock,
  createCorpusLock,
  createExperimentLock,
  createSampleLock,
  type LockManager,
  type LockManagerContext,
} from "../src/lock/managers.js";

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `expctl-${prefix}-`));
}

/** Write `files` (relative path → content) under `dir`. */
export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(dir, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

export type Pipeline = {
  root: string;
  store: LockStore;
  ctx: LockManagerContext;
  corpus: LockManager;
  sample: LockManager;
  config: LockManager;
  experiment: LockManager;
};

/** Lock managers for corpus → sample "small" → config "default" → experiment "exp1" under `root`. */
export function makePipeline(root: string): Pipeline {
  const store = new LockStore();
  const ctx: LockManagerContext = { store, dataFiles: DEFAULT_CONFIG.data_files };
  const corpus = createCorpusLock(ctx, path.join(root, "corpus"));
  const sample = createSampleLock(ctx, corpus, "small", path.join(root, "samples", "small"));
  const config = createConfigLock(ctx, sample, "default", path.join(root, "configs", "default"));
  const experiment = createExperimentLock(ctx, config, sample, "exp1", path.join(root, "experiments", "exp1"));
  return { root, store, ctx, corpus, sample, config, experiment };
}

/** Stage work that writes fixed files into the stage directory. */
export function writeWork(files: Record<string, string>): (dir: string) => Promise<void> {
  return async (dir) => {
    writeFiles(dir, files);
  };
}
