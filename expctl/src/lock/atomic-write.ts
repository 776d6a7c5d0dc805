import { mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Write `data` to `path` so readers only ever see the old file or the new one:
 * temp sibling → fsync → rename → fsync of the directory.
 */
export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(data);
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    try {
      if (fh) await fh.close();
      await unlink(tmp);
    } catch {
      // the temp file may never have been created; the original error matters
    }
    throw e;
  }

  await syncDirectory(dirname(path));
}

/** Unlink `path` and make the removal durable. Returns false if it did not exist. */
export async function removeFileDurable(path: string): Promise<boolean> {
  try {
    await unlink(path);
  } catch (e) {
    if (isMissingFileError(e)) return false;
    throw e;
  }
  await syncDirectory(dirname(path));
  return true;
}

/** fsync a directory so renames and unlinks inside it survive a crash. */
export async function syncDirectory(dir: string): Promise<void> {
  // Directories cannot be opened for fsync on Windows.
  if (process.platform === "win32") return;

  const fh = await open(dir, "r");
  try {
    await fh.sync();
  } finally {
    await fh.close();
  }
}

export function isMissingFileError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
