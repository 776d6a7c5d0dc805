import { isPipelineError } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  WORK_FAILED: 1,
  NOT_CACHED: 2,
  STALE_DEPENDENCY: 3,
  CORRUPT_CACHE: 4,
  INVALID_ARGS: 5,
  IO_ERROR: 6,
  CANCELLED: 7,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(e: unknown): ExitCode {
  if (!isPipelineError(e)) return EXIT.INVALID_ARGS;
  switch (e.code) {
    case "NOT_CACHED":
      return EXIT.NOT_CACHED;
    case "STALE_DEPENDENCY":
      return EXIT.STALE_DEPENDENCY;
    case "CORRUPT_CACHE":
      return EXIT.CORRUPT_CACHE;
    case "IO_ERROR":
    case "LOCKFILE_MALFORMED":
      return EXIT.IO_ERROR;
    case "WORK_FAILED":
      return EXIT.WORK_FAILED;
    case "RUN_CANCELLED":
      return EXIT.CANCELLED;
  }
}
