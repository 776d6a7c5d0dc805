/** Configuration types — layered config system. */
import type { StageKind } from "./stage.js";

export type OutputFormat = "human" | "jsonl";

export type StageLayoutConfig = {
  corpus: string;
  samples: string;
  configs: string;
  experiments: string;
};

export type StageCommandConfig = {
  /** argv template; first entry is the executable. Empty means no external work. */
  command: string[];
  timeout_ms?: number;
};

export type LogConfig = {
  format: OutputFormat;
  /** Relative to the workspace root. Empty string disables the progress log. */
  progress_log: string;
};

export type ExpctlConfig = {
  schema_version: string;
  workspace_root: string;
  lockfile_name: string;
  verify_integrity: boolean;
  layout: StageLayoutConfig;
  data_files: Record<StageKind, string[]>;
  stages: Partial<Record<StageKind, StageCommandConfig>>;
  log: LogConfig;
};
