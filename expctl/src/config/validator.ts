import { formatAjvErrors, loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { ExpctlConfig } from "../types/config.js";
import { loadConfigLayers, type LoadConfigOptions } from "./loader.js";

const patternList = { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 };

const stageCommand = {
  type: "object",
  required: ["command"],
  additionalProperties: false,
  properties: {
    command: { type: "array", items: { type: "string" } },
    timeout_ms: { type: "integer", minimum: 0 },
  },
};

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "workspace_root", "lockfile_name", "verify_integrity", "layout", "data_files", "stages", "log"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    workspace_root: { type: "string", minLength: 1 },
    lockfile_name: { type: "string", pattern: "^[A-Za-z0-9._-]+$" },
    verify_integrity: { type: "boolean" },
    layout: {
      type: "object",
      required: ["corpus", "samples", "configs", "experiments"],
      additionalProperties: false,
      properties: {
        corpus: { type: "string", minLength: 1 },
        samples: { type: "string", minLength: 1 },
        configs: { type: "string", minLength: 1 },
        experiments: { type: "string", minLength: 1 },
      },
    },
    data_files: {
      type: "object",
      required: ["corpus", "sample", "config", "experiment"],
      additionalProperties: false,
      properties: {
        corpus: patternList,
        sample: patternList,
        config: patternList,
        experiment: patternList,
      },
    },
    stages: {
      type: "object",
      additionalProperties: false,
      properties: {
        corpus: stageCommand,
        sample: stageCommand,
        config: stageCommand,
        experiment: stageCommand,
      },
    },
    log: {
      type: "object",
      required: ["format", "progress_log"],
      additionalProperties: false,
      properties: {
        format: { type: "string", enum: ["human", "jsonl"] },
        progress_log: { type: "string" },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: ExpctlConfig; errors: null }
  | { valid: false; errors: string };

let compiled: AjvValidateFn | null = null;

function isExpctlConfig(validate: AjvValidateFn, data: unknown): data is ExpctlConfig {
  return validate(data);
}

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  compiled ??= ajv.compile(CONFIG_SCHEMA);
  if (isExpctlConfig(compiled, config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: formatAjvErrors(ajv, compiled.errors) };
}

/** Load the layered config and validate it; throws with the schema errors. */
export function loadConfig(opts: LoadConfigOptions): ExpctlConfig {
  const res = validateConfig(loadConfigLayers(opts));
  if (!res.valid) {
    throw new Error(`Invalid configuration in ${opts.configDir}: ${res.errors}`);
  }
  return res.config;
}
