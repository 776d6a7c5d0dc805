import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ExpctlConfig } from "../types/config.js";
import { DEFAULT_CONFIG } from "./defaults.js";

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed object, or an empty object if not found. */
function loadYaml(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply EXPCTL_ prefixed environment variable overrides to top-level scalar keys. */
function applyEnvOverrides(config: PlainObject, env: NodeJS.ProcessEnv): PlainObject {
  const prefix = "EXPCTL_";
  const result: PlainObject = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;
    // EXPCTL_WORKSPACE_ROOT → workspace_root
    const configKey = key.slice(prefix.length).toLowerCase();
    if (isPlainObject(result[configKey])) continue;
    result[configKey] = value === "true" ? true : value === "false" ? false : value;
  }
  return result;
}

export type LoadConfigOptions = {
  /** Directory holding base.yaml and <env>.yaml. */
  configDir: string;
  /** Optional environment overlay, e.g. "ci" loads `<configDir>/ci.yaml`. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: defaults ← base.yaml ← <env>.yaml ← environment variables.
 * The result is not validated; pass it through `validateConfig`.
 */
export function loadConfigLayers(opts: LoadConfigOptions): PlainObject {
  let merged = deepMerge({ ...DEFAULT_CONFIG }, loadYaml(path.join(opts.configDir, "base.yaml")));

  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(opts.configDir, `${opts.envName}.yaml`)));
  }

  return applyEnvOverrides(merged, opts.env ?? process.env);
}
