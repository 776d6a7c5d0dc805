#!/usr/bin/env node

import { Command } from "commander";
import { validateAll } from "./commands/validate.js";
import { run } from "./commands/run.js";
import { status, formatStatusLine } from "./commands/status.js";
import { invalidate } from "./commands/invalidate.js";
import { signature } from "./commands/signature.js";
import { EXIT } from "./commands/exit-codes.js";
import type { CommandFailure } from "./commands/context.js";
import type { OutputFormat } from "./types/config.js";
import { isStageKind, type StageKind, type StageSelection } from "./types/stage.js";

type GlobalOpts = {
  configDir: string;
  env?: string;
  format?: OutputFormat;
  sample?: string;
  config?: string;
  experiment?: string;
};

const program = new Command();

program
  .name("expctl")
  .description("Dependency-signature locking for corpus → sample → config → experiment pipelines")
  .version("0.1.0");

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("--config-dir <path>", "Path to config directory", "config")
    .option("--env <name>", "Config overlay to load (<config-dir>/<name>.yaml)")
    .option("--format <format>", "Output format: human|jsonl")
    .option("--sample <name>", "Sample to operate on")
    .option("--config <name>", "Configuration to operate on (built from --sample)")
    .option("--experiment <name>", "Experiment to operate on (runs --config over --sample)");
}

function selectionOf(opts: GlobalOpts): StageSelection {
  return { sample: opts.sample, config: opts.config, experiment: opts.experiment };
}

function commandOpts(opts: GlobalOpts) {
  return { configDir: opts.configDir, envName: opts.env, format: opts.format, selection: selectionOf(opts) };
}

function parseStage(value: string): StageKind {
  if (!isStageKind(value)) {
    process.stderr.write(`Unknown stage "${value}" (expected corpus|sample|config|experiment)\n`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return value;
}

function fail(res: CommandFailure, format: OutputFormat | undefined): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", ...res.error }) + "\n");
  } else {
    console.error(res.error.message);
    if (res.error.hint) console.error(`hint: ${res.error.hint}`);
  }
  process.exit(res.exitCode);
}

withCommonOptions(program.command("run"))
  .description("Run a stage if its cache is missing; refuse if a dependency changed")
  .argument("<stage>", "corpus|sample|config|experiment")
  .option("--force", "Rebuild even if the cache is valid or stale")
  .action(async (stageArg: string, opts: GlobalOpts & { force?: boolean }) => {
    const stage = parseStage(stageArg);
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    process.once("SIGINT", onSigint);

    try {
      const res = await run({ ...commandOpts(opts), stage, force: opts.force, signal: controller.signal });
      if (!res.ok) fail(res, opts.format);

      if (opts.format === "jsonl") {
        process.stdout.write(
          JSON.stringify({ level: "info", code: "OK", stage: res.stage, outcome: res.outcome, path: res.path }) + "\n",
        );
      } else {
        console.log(`${res.stage}: ${res.outcome}`);
      }
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  });

withCommonOptions(program.command("status"))
  .description("Show whether the corpus and each selected stage is valid, stale or not cached")
  .action(async (opts: GlobalOpts) => {
    const res = await status(commandOpts(opts));
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      for (const s of res.stages) process.stdout.write(JSON.stringify(s) + "\n");
    } else {
      for (const s of res.stages) console.log(formatStatusLine(s));
    }
  });

withCommonOptions(program.command("invalidate"))
  .description("Delete a stage's lock file so its next run rebuilds it")
  .argument("<stage>", "corpus|sample|config|experiment")
  .action(async (stageArg: string, opts: GlobalOpts) => {
    const res = await invalidate({ ...commandOpts(opts), stage: parseStage(stageArg) });
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", stage: res.stage, removed: res.removed }) + "\n");
    }
  });

withCommonOptions(program.command("signature"))
  .description("Print a stage's live signatures next to its recorded ones")
  .argument("<stage>", "corpus|sample|config|experiment")
  .action(async (stageArg: string, opts: GlobalOpts) => {
    const res = await signature({ ...commandOpts(opts), stage: parseStage(stageArg) });
    if (!res.ok) fail(res, opts.format);

    const { ok: _ok, ...body } = res;
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(body) + "\n");
    } else {
      console.log(JSON.stringify(body, null, 2));
    }
  });

program
  .command("validate")
  .description("Validate config and every lock file in the workspace")
  .option("--config-dir <path>", "Path to config directory", "config")
  .option("--env <name>", "Config overlay to load")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { configDir: string; env?: string; format: OutputFormat }) => {
    const res = await validateAll({ configDir: opts.configDir, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.stage ? `${err.stage}: ${err.message}` : err.message);
      }
      process.exit(EXIT.IO_ERROR);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", checked: res.checked }) + "\n");
    } else {
      console.log(`OK (${res.checked} lock files)`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
