import fs from "node:fs";
import path from "node:path";
import { validateConfig } from "../config/validator.js";
import { loadConfigLayers } from "../config/loader.js";
import { describeCause } from "../core/errors.js";
import { LockStore } from "../lock/lock-store.js";
import { stageLabel } from "../lock/managers.js";
import { diag, type Diagnostic } from "../log/logger.js";
import type { ExpctlConfig } from "../types/config.js";
import type { StageKind } from "../types/stage.js";

export type ValidateResult = { ok: true; checked: number } | { ok: false; errors: Diagnostic[] };

type StageDir = { kind: StageKind; name: string; dir: string };

/** Every stage directory the layout knows about, whether locked or not. */
function listStageDirs(root: string, config: ExpctlConfig): StageDir[] {
  const out: StageDir[] = [{ kind: "corpus", name: "corpus", dir: path.join(root, config.layout.corpus) }];
  const groups: Array<[StageKind, string]> = [
    ["sample", config.layout.samples],
    ["config", config.layout.configs],
    ["experiment", config.layout.experiments],
  ];
  for (const [kind, rel] of groups) {
    const parent = path.join(root, rel);
    if (!fs.existsSync(parent)) continue;
    for (const entry of fs.readdirSync(parent, { withFileTypes: true })) {
      if (entry.isDirectory()) out.push({ kind, name: entry.name, dir: path.join(parent, entry.name) });
    }
  }
  return out;
}

/**
 * Validate the layered config, then every lock file in the workspace against
 * the lock file schema.
 */
export async function validateAll(opts: {
  configDir: string;
  envName?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = path.resolve(cwd, opts.configDir);

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let layered: Record<string, unknown>;
  try {
    layered = loadConfigLayers({ configDir, envName: opts.envName, env: opts.env });
  } catch (e) {
    return { ok: false, errors: [diag("error", "CONFIG_UNREADABLE", describeCause(e))] };
  }

  const res = validateConfig(layered);
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", res.errors)] };
  }

  const config = res.config;
  const root = path.resolve(cwd, config.workspace_root);
  const store = new LockStore({ lockfileName: config.lockfile_name });
  const errors: Diagnostic[] = [];
  let checked = 0;

  for (const stage of listStageDirs(root, config)) {
    const label = stageLabel(stage.kind, stage.name);
    try {
      if (await store.load({ dir: stage.dir, label })) checked++;
    } catch (e) {
      errors.push(
        diag("error", "LOCKFILE_INVALID", describeCause(e), {
          stage: label,
          details: { path: store.pathFor({ dir: stage.dir, label }) },
        }),
      );
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, checked };
}
