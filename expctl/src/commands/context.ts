import path from "node:path";
import { loadConfig } from "../config/validator.js";
import { describeCause, isPipelineError } from "../core/errors.js";
import { openWorkspace, type Workspace } from "../lock/workspace.js";
import { createLogger, type Logger } from "../log/logger.js";
import type { ExpctlConfig, OutputFormat } from "../types/config.js";
import type { StageSelection } from "../types/stage.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandOpts = {
  configDir: string;
  envName?: string;
  selection?: StageSelection;
  /** Overrides `log.format` from config. */
  format?: OutputFormat;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Use this logger instead of one built from config. */
  logger?: Logger;
};

export type CommandContext = {
  config: ExpctlConfig;
  workspace: Workspace;
  logger: Logger;
};

export type CommandFailure = {
  ok: false;
  error: { code: string; message: string; hint?: string };
  exitCode: ExitCode;
};

/** Load config, wire the selected stages and build the logger. */
export function openContext(opts: CommandOpts): CommandContext {
  const cwd = opts.cwd ?? process.cwd();
  const config = loadConfig({ configDir: path.resolve(cwd, opts.configDir), envName: opts.envName, env: opts.env });
  const workspace = openWorkspace(config, opts.selection ?? {}, cwd);
  const logger =
    opts.logger ??
    createLogger({
      format: opts.format ?? config.log.format,
      progressLogPath: config.log.progress_log ? path.resolve(workspace.root, config.log.progress_log) : undefined,
    });
  return { config, workspace, logger };
}

export function toFailure(e: unknown): CommandFailure {
  if (isPipelineError(e)) {
    return { ok: false, error: { code: e.code, message: e.message, hint: e.hint }, exitCode: exitCodeFor(e) };
  }
  return { ok: false, error: { code: "INVALID_ARGS", message: describeCause(e) }, exitCode: exitCodeFor(e) };
}
