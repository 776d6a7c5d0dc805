import fs from "node:fs";
import path from "node:path";
import type { OutputFormat } from "../types/config.js";
import { redactSensitiveInfo, sanitizeLogMessage } from "./sanitize.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  stage?: string;
  details?: Record<string, unknown>;
};

export interface Logger {
  emit(d: Diagnostic): void;
}

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "stage" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export const silentLogger: Logger = {
  emit: () => undefined,
};

/** Collects diagnostics in memory; handy for callers that report later. */
export class MemoryLogger implements Logger {
  readonly diagnostics: Diagnostic[] = [];

  emit(d: Diagnostic): void {
    this.diagnostics.push(d);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}

export type LoggerOptions = {
  format: OutputFormat;
  /** Append-only progress log; every diagnostic lands here regardless of format. */
  progressLogPath?: string;
  out?: NodeJS.WritableStream;
  err?: NodeJS.WritableStream;
};

/**
 * Console logger: `human` prints messages (warnings and errors to stderr),
 * `jsonl` prints one JSON object per diagnostic to stdout.
 */
export function createLogger(opts: LoggerOptions): Logger {
  const out = opts.out ?? process.stdout;
  const err = opts.err ?? process.stderr;
  const progress = opts.progressLogPath ? progressLogWriter(opts.progressLogPath) : null;

  return {
    emit(d: Diagnostic): void {
      progress?.(d);
      if (opts.format === "jsonl") {
        out.write(JSON.stringify(d) + "\n");
        return;
      }
      if (d.level === "info") {
        out.write(`${d.message}\n`);
      } else {
        err.write(`${d.level}: ${d.message}\n`);
      }
    },
  };
}

export function formatProgressLine(d: Diagnostic, at: Date = new Date()): string {
  const stage = sanitizeLogMessage(d.stage ?? "-");
  const msg = sanitizeLogMessage(redactSensitiveInfo(d.message));
  return `[${at.toISOString()}] level=${d.level} code=${d.code} stage=${stage} ${msg}\n`;
}

function progressLogWriter(filePath: string): (d: Diagnostic) => void {
  let ready = false;
  return (d) => {
    if (!ready) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      ready = true;
    }
    fs.appendFileSync(filePath, formatProgressLine(d), "utf8");
  };
}
