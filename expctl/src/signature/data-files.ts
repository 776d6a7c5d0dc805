import { readdir, realpath, stat } from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";

export type DataFileFilter = {
  /** minimatch patterns, matched against the root-relative POSIX path. */
  patterns: readonly string[];
  /** Lock file name; it and its temporaries are never data. */
  lockfileName: string;
};

/** Root-relative path with forward slashes, so signatures match across platforms. */
export function toPosixRelative(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}

export function isLockArtifact(relPath: string, lockfileName: string): boolean {
  const base = relPath.slice(relPath.lastIndexOf("/") + 1);
  return base === lockfileName || base.startsWith(`${lockfileName}.tmp.`);
}

/**
 * List every data file under `root` (recursively) that matches the filter.
 * Symbolic links are followed and keyed by the link's own path; a link back
 * into one of its ancestor directories is an error. Returns absolute paths,
 * sorted by relative path. Throws if `root` is missing.
 */
export async function listDataFiles(root: string, filter: DataFileFilter): Promise<string[]> {
  const out: string[] = [];
  await collectFiles(root, root, filter, out, new Set([await realpath(root)]));
  return out.sort((a, b) => compareCodeUnits(toPosixRelative(root, a), toPosixRelative(root, b)));
}

async function collectFiles(
  root: string,
  currentDir: string,
  filter: DataFileFilter,
  out: string[],
  ancestors: ReadonlySet<string>,
): Promise<void> {
  const entries = await readdir(currentDir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(currentDir, entry.name);
    let isDirectory = entry.isDirectory();
    let isFile = entry.isFile();

    if (entry.isSymbolicLink()) {
      const target = await stat(fullPath);
      isDirectory = target.isDirectory();
      isFile = target.isFile();
    }

    if (isDirectory) {
      const real = await realpath(fullPath);
      if (ancestors.has(real)) {
        throw new Error(`Symbolic link cycle at ${fullPath}`);
      }
      await collectFiles(root, fullPath, filter, out, new Set([...ancestors, real]));
      continue;
    }
    if (!isFile) continue;

    const rel = toPosixRelative(root, fullPath);
    if (isLockArtifact(rel, filter.lockfileName)) continue;
    if (filter.patterns.some((p) => minimatch(rel, p, { dot: true }))) {
      out.push(fullPath);
    }
  }
}

/** Locale-independent ordering. */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
