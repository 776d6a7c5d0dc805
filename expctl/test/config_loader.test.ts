import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { deepMerge, loadConfigLayers } from "../src/config/loader.js";
import { loadConfig, validateConfig } from "../src/config/validator.js";
import { DEFAULT_CONFIG } from "../src/config/defaults.js";
import { makeTmpDir } from "./helpers.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: {} });
    expect(config.schema_version).toBe("1.0.0");
    expect(config.lockfile_name).toBe("LOCKFILE");
    expect(config.layout.samples).toBe("samples");
    expect(config.stages.corpus?.command).toEqual([]);
    expect(config.stages.sample?.command[0]).toBe("./tool/bin/indexer");
    expect(config.stages.sample?.timeout_ms).toBe(3600000);
    expect(config.log).toEqual({ format: "human", progress_log: ".expctl/progress.log" });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, envName: "ci", env: {} });
    expect(config.log).toEqual({ format: "jsonl", progress_log: "" });
    // base fields still present
    expect(config.layout.corpus).toBe("corpus");
    expect(config.stages.experiment?.timeout_ms).toBe(7200000);
  });

  it("applies environment variable overrides to top-level scalars", () => {
    const config = loadConfig({
      configDir: CONFIG_DIR,
      env: { EXPCTL_WORKSPACE_ROOT: "/tmp/override", EXPCTL_VERIFY_INTEGRITY: "false", EXPCTL_LAYOUT: "ignored" },
    });
    expect(config.workspace_root).toBe("/tmp/override");
    expect(config.verify_integrity).toBe(false);
    expect(config.layout.experiments).toBe("experiments");
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, envName: "ci", env: { EXPCTL_LOCKFILE_NAME: "stage.lock" } });
    expect(config.lockfile_name).toBe("stage.lock");
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, envName: "nonexistent-env", env: {} });
    expect(config.log.format).toBe("human");
  });

  it("falls back to defaults when the config dir has no files", () => {
    const tmpDir = makeTmpDir("cfg-empty");
    try {
      expect(loadConfig({ configDir: tmpDir, env: {} })).toEqual(DEFAULT_CONFIG);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    const merged = deepMerge(
      { a: { b: 1, c: [1, 2] }, d: "keep" },
      { a: { c: [3] }, d: null },
    );
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: "keep" });
  });
});

describe("config validator", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("cfg");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("validates the built-in defaults", () => {
    const res = validateConfig(DEFAULT_CONFIG);
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects config missing required fields", () => {
    const res = validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property");
  });

  it("rejects unknown keys and bad enum values", () => {
    expect(validateConfig({ ...DEFAULT_CONFIG, phase: "1a" }).valid).toBe(false);
    expect(validateConfig({ ...DEFAULT_CONFIG, log: { format: "xml", progress_log: "" } }).valid).toBe(false);
    expect(validateConfig({ ...DEFAULT_CONFIG, stages: { corpus: { command: "make" } } }).valid).toBe(false);
  });

  it("loadConfig throws with the schema errors", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "lockfile_name: 'bad/name'\n");
    expect(() => loadConfig({ configDir: tmpDir, env: {} })).toThrow(`Invalid configuration in ${tmpDir}`);
  });

  it("rejects a YAML file that is not a mapping", () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- one\n- two\n");
    expect(() => loadConfigLayers({ configDir: tmpDir, env: {} })).toThrow("Config file must contain a mapping");
  });
});
