import type { ExpctlConfig } from "../types/config.js";

/**
 * Built-in configuration; `base.yaml`, the environment overlay and `EXPCTL_*`
 * variables are layered on top.
 */
export const DEFAULT_CONFIG: ExpctlConfig = {
  schema_version: "1.0.0",
  workspace_root: ".",
  lockfile_name: "LOCKFILE",
  verify_integrity: true,
  layout: {
    corpus: "corpus",
    samples: "samples",
    configs: "configs",
    experiments: "experiments",
  },
  data_files: {
    corpus: ["**/*"],
    sample: ["**/*"],
    config: ["**/*"],
    experiment: ["**/*"],
  },
  stages: {},
  log: {
    format: "human",
    progress_log: ".expctl/progress.log",
  },
};
