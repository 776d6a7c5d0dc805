import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { invalidate } from "../src/commands/invalidate.js";
import { run } from "../src/commands/run.js";
import { signature } from "../src/commands/signature.js";
import { formatStatusLine, status } from "../src/commands/status.js";
import { validateAll } from "../src/commands/validate.js";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { IOError, NotCachedError, RunCancelledError } from "../src/core/errors.js";
import { MemoryLogger } from "../src/log/logger.js";
import { makeTmpDir, writeFiles } from "./helpers.js";

const writeArg = "require('fs').writeFileSync(process.argv[1], process.argv[2])";

describe("exit-codes", () => {
  it("defines all required exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.WORK_FAILED).toBe(1);
    expect(EXIT.NOT_CACHED).toBe(2);
    expect(EXIT.STALE_DEPENDENCY).toBe(3);
    expect(EXIT.CORRUPT_CACHE).toBe(4);
    expect(EXIT.INVALID_ARGS).toBe(5);
    expect(EXIT.IO_ERROR).toBe(6);
    expect(EXIT.CANCELLED).toBe(7);
  });

  it("maps errors to exit codes", () => {
    expect(exitCodeFor(new NotCachedError("sample 'a'", "corpus"))).toBe(EXIT.NOT_CACHED);
    expect(exitCodeFor(new IOError("corpus", "/x", "boom", { malformed: true }))).toBe(EXIT.IO_ERROR);
    expect(exitCodeFor(new RunCancelledError("corpus", new Error("aborted")))).toBe(EXIT.CANCELLED);
    expect(exitCodeFor(new Error("bad flag"))).toBe(EXIT.INVALID_ARGS);
  });
});

describe("commands", () => {
  let tmpDir: string;
  let logger: MemoryLogger;

  beforeEach(() => {
    tmpDir = makeTmpDir("cmd");
    logger = new MemoryLogger();
    fs.mkdirSync(path.join(tmpDir, "config"));
    // JSON is valid YAML
    fs.writeFileSync(
      path.join(tmpDir, "config", "base.yaml"),
      JSON.stringify({
        log: { format: "human", progress_log: "" },
        stages: {
          corpus: { command: [] },
          sample: { command: [process.execPath, "-e", writeArg, "manifest.txt", "doc1.txt"] },
          config: { command: [process.execPath, "-e", "process.exit(4)"] },
        },
      }),
    );
    writeFiles(tmpDir, { "corpus/doc1.txt": "first document", "corpus/doc2.txt": "second document" });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const opts = (extra: { sample?: string; config?: string } = {}) => ({
    configDir: "config",
    cwd: tmpDir,
    env: {},
    logger,
    selection: extra,
  });

  it("runs the pipeline from configured commands", async () => {
    const corpus = await run({ ...opts(), stage: "corpus" });
    expect(corpus).toMatchObject({ ok: true, stage: "corpus", outcome: "committed" });

    const sample = await run({ ...opts({ sample: "small" }), stage: "sample" });
    expect(sample).toMatchObject({ ok: true, stage: "sample 'small'", outcome: "committed" });
    expect(fs.readFileSync(path.join(tmpDir, "samples", "small", "manifest.txt"), "utf8")).toBe("doc1.txt");

    const again = await run({ ...opts({ sample: "small" }), stage: "sample" });
    expect(again).toMatchObject({ ok: true, outcome: "cached", path: ["CHECKING", "VALID_CACHE", "DONE"] });
    expect(logger.codes()).toContain("WORK_ADOPTED");
  });

  it("reports a missing dependency with its exit code", async () => {
    const res = await run({ ...opts({ sample: "small" }), stage: "sample" });
    expect(res).toEqual({
      ok: false,
      error: {
        code: "NOT_CACHED",
        message: "sample 'small': dependency corpus has no cached result — run corpus first",
        hint: "run corpus first",
      },
      exitCode: EXIT.NOT_CACHED,
    });
  });

  it("reports stale dependencies with their exit code", async () => {
    await run({ ...opts(), stage: "corpus" });
    await run({ ...opts({ sample: "small" }), stage: "sample" });
    fs.writeFileSync(path.join(tmpDir, "corpus", "doc2.txt"), "revised");
    await run({ ...opts(), stage: "corpus", force: true });

    const res = await run({ ...opts({ sample: "small" }), stage: "sample" });
    expect(res).toMatchObject({ ok: false, error: { code: "STALE_DEPENDENCY" }, exitCode: EXIT.STALE_DEPENDENCY });
  });

  it("reports failed work and keeps the previous state", async () => {
    await run({ ...opts(), stage: "corpus" });
    await run({ ...opts({ sample: "small" }), stage: "sample" });

    const res = await run({ ...opts({ sample: "small", config: "default" }), stage: "config" });
    expect(res).toMatchObject({ ok: false, error: { code: "WORK_FAILED" }, exitCode: EXIT.WORK_FAILED });
    expect(fs.existsSync(path.join(tmpDir, "configs", "default", "LOCKFILE"))).toBe(false);
  });

  it("accepts a work override", async () => {
    await run({ ...opts(), stage: "corpus" });
    await run({ ...opts({ sample: "small" }), stage: "sample" });

    const res = await run({
      ...opts({ sample: "small", config: "default" }),
      stage: "config",
      work: async (dir) => {
        writeFiles(dir, { "stats.txt": "docs=1" });
      },
    });
    expect(res).toMatchObject({ ok: true, stage: "config 'default'", outcome: "committed" });
  });

  it("rejects a config selection without its sample", async () => {
    const res = await run({ ...opts({ config: "default" }), stage: "config" });
    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: "A config is built from a sample: pass --sample as well" },
      exitCode: EXIT.INVALID_ARGS,
    });
  });

  it("status lists each selected stage", async () => {
    await run({ ...opts(), stage: "corpus" });

    const res = await status(opts({ sample: "small" }));
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.stages.map((s) => [s.label, s.health])).toEqual([
      ["corpus", "valid"],
      ["sample 'small'", "not_cached"],
    ]);
    expect(formatStatusLine(res.stages[0])).toBe(`${"corpus".padEnd(28)} ${"valid".padEnd(10)}`);
  });

  it("signature shows live and recorded signatures", async () => {
    await run({ ...opts(), stage: "corpus" });
    await run({ ...opts({ sample: "small" }), stage: "sample" });

    const res = await signature({ ...opts({ sample: "small" }), stage: "sample" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.locked).toBe(true);
    expect(res.signature).toBe(res.record?.ownSignature);
    expect(res.dependencySignatures).toEqual(res.record?.dependencySignatures);
  });

  it("invalidate removes the lock file", async () => {
    await run({ ...opts(), stage: "corpus" });

    expect(await invalidate({ ...opts(), stage: "corpus" })).toEqual({ ok: true, stage: "corpus", removed: true });
    expect(fs.existsSync(path.join(tmpDir, "corpus", "LOCKFILE"))).toBe(false);
  });

  describe("validate", () => {
    it("checks config and every lock file", async () => {
      await run({ ...opts(), stage: "corpus" });
      await run({ ...opts({ sample: "small" }), stage: "sample" });

      expect(await validateAll({ configDir: "config", cwd: tmpDir, env: {} })).toEqual({ ok: true, checked: 2 });
    });

    it("reports malformed lock files by stage", async () => {
      writeFiles(tmpDir, { "samples/small/LOCKFILE": "{}" });

      const res = await validateAll({ configDir: "config", cwd: tmpDir, env: {} });
      expect(res.ok).toBe(false);
      if (res.ok) return;
      expect(res.errors).toHaveLength(1);
      expect(res.errors[0]).toMatchObject({ code: "LOCKFILE_INVALID", stage: "sample 'small'" });
    });

    it("reports a missing config directory", async () => {
      const res = await validateAll({ configDir: "nope", cwd: tmpDir, env: {} });
      expect(res).toMatchObject({ ok: false, errors: [{ code: "CONFIG_DIR_MISSING" }] });
    });

    it("reports an invalid config", async () => {
      fs.writeFileSync(path.join(tmpDir, "config", "base.yaml"), "verify_integrity: maybe\n");
      const res = await validateAll({ configDir: "config", cwd: tmpDir, env: {} });
      expect(res).toMatchObject({ ok: false, errors: [{ code: "CONFIG_INVALID" }] });
    });
  });
});
