import { execFile } from "node:child_process";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import type { StageWork } from "../core/pipeline-runner.js";
import type { LockManager } from "../lock/managers.js";
import type { StageLocks } from "../lock/workspace.js";
import { diag, silentLogger, type Logger } from "../log/logger.js";
import { redactSensitiveInfo, sanitizeLogMessage } from "../log/sanitize.js";
import type { ExpctlConfig } from "../types/config.js";

const pExecFile = promisify(execFile);

const MAX_LOGGED_OUTPUT = 5000;

export type CommandWorkOptions = {
  config: ExpctlConfig;
  /** Workspace root; relative executables like `./tool/bin/x` resolve against it. */
  root: string;
  locks: StageLocks;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
};

/** `{name}`-style values available to a stage's command template. */
export function placeholderValues(root: string, locks: StageLocks, stage: LockManager): Record<string, string> {
  const values: Record<string, string> = {
    workspace: root,
    stageDir: stage.dir,
    name: stage.name,
    corpusDir: locks.corpus.dir,
  };
  if (locks.sample) values.sampleDir = locks.sample.dir;
  if (locks.config) values.configDir = locks.config.dir;
  if (locks.experiment) values.experimentDir = locks.experiment.dir;
  return values;
}

/** Substitute `{key}` placeholders; an unknown key is an error, not an empty string. */
export function expandCommand(template: readonly string[], values: Record<string, string>): string[] {
  return template.map((arg) =>
    arg.replace(/\{([A-Za-z]+)\}/g, (_match, key: string) => {
      const value = values[key];
      if (value === undefined) {
        throw new Error(`Unknown placeholder {${key}} in command argument ${JSON.stringify(arg)}`);
      }
      return value;
    }),
  );
}

/** Only pass through what a tool needs to find binaries and locales. */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {};
  for (const key of ["PATH", "HOME", "USER", "LANG", "LC_ALL", "TERM", "TMPDIR"]) {
    const value = env[key];
    if (value !== undefined) safe[key] = value;
  }
  return safe;
}

/**
 * Work collaborator backed by the stage's configured command. The command runs
 * with the stage directory as its working directory; the parent process never
 * changes its own cwd. An empty command adopts the directory's current content.
 */
export function createCommandWork(opts: CommandWorkOptions): StageWork {
  const logger = opts.logger ?? silentLogger;

  return async (stageDir, { stage, signal }) => {
    await mkdir(stageDir, { recursive: true });

    const stageConfig = opts.config.stages[stage.kind];
    const template = stageConfig?.command ?? [];
    if (template.length === 0) {
      logger.emit(
        diag("info", "WORK_ADOPTED", `${stage.label}: no command configured; locking current contents`, {
          stage: stage.label,
        }),
      );
      return;
    }

    const [executable, ...args] = expandCommand(template, placeholderValues(opts.root, opts.locks, stage));
    const file = executable.includes("/") && !path.isAbsolute(executable) ? path.resolve(opts.root, executable) : executable;

    logger.emit(
      diag("info", "WORK_STARTED", `${stage.label}: ${redactSensitiveInfo([file, ...args].join(" "))}`, {
        stage: stage.label,
      }),
    );

    try {
      const { stdout, stderr } = await pExecFile(file, args, {
        cwd: stageDir,
        encoding: "utf8",
        env: sanitizeEnv(opts.env ?? process.env),
        timeout: stageConfig?.timeout_ms ?? 0,
        maxBuffer: 64 * 1024 * 1024,
        signal,
      });
      logOutput(logger, stage, "stdout", stdout);
      logOutput(logger, stage, "stderr", stderr);
    } catch (e) {
      if (typeof e === "object" && e !== null) {
        if ("stdout" in e && typeof e.stdout === "string") logOutput(logger, stage, "stdout", e.stdout);
        if ("stderr" in e && typeof e.stderr === "string") logOutput(logger, stage, "stderr", e.stderr);
      }
      throw e;
    }
  };
}

function logOutput(logger: Logger, stage: LockManager, stream: "stdout" | "stderr", text: string): void {
  const trimmed = text.trim();
  if (!trimmed) return;
  logger.emit(
    diag("info", stream === "stdout" ? "WORK_STDOUT" : "WORK_STDERR", sanitizeLogMessage(trimmed.slice(0, MAX_LOGGED_OUTPUT)), {
      stage: stage.label,
    }),
  );
}
