import { readFile } from "node:fs/promises";
import path from "node:path";
import { IOError, describeCause, withIo } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { CheckedOutRecord, DependencySignatures, LockRecord, SerializedLockRecord } from "../types/lock-record.js";
import { isDependencyName } from "../types/stage.js";
import { toSignature } from "../types/signature.js";
import { compareCodeUnits } from "../signature/data-files.js";
import { isMissingFileError, removeFileDurable, writeFileAtomic } from "./atomic-write.js";

export const DEFAULT_LOCKFILE_NAME = "LOCKFILE";

/** The part of a stage the store needs: where it lives and how to name it in errors. */
export type LockTarget = {
  readonly dir: string;
  readonly label: string;
};

export type LockStoreOptions = {
  lockfileName?: string;
  registry?: SchemaRegistry;
};

/**
 * Lock Store — reads, writes and checks out the lock record of a stage directory.
 *
 * Every write goes through {@link writeFileAtomic}, so on disk the lock file is
 * always either absent, the previous record or the new one. A file that cannot
 * be parsed is reported, never treated as absent or valid.
 */
export class LockStore {
  readonly lockfileName: string;
  private readonly registry: SchemaRegistry;

  constructor(opts: LockStoreOptions = {}) {
    this.lockfileName = opts.lockfileName ?? DEFAULT_LOCKFILE_NAME;
    this.registry = opts.registry ?? createRegistry();
  }

  pathFor(target: LockTarget): string {
    return path.join(target.dir, this.lockfileName);
  }

  async exists(target: LockTarget): Promise<boolean> {
    return (await this.readBytes(target)) !== null;
  }

  async load(target: LockTarget): Promise<LockRecord | null> {
    const bytes = await this.readBytes(target);
    return bytes === null ? null : this.parse(target, bytes);
  }

  async save(target: LockTarget, record: LockRecord): Promise<void> {
    const file = this.pathFor(target);
    await withIo(target.label, file, "writing lock file", () => writeFileAtomic(file, serializeLockRecord(record)));
  }

  /**
   * Remove the lock record, handing back what was there (bytes included) so a
   * failed run can put it back verbatim. Returns null if there was no record.
   */
  async delete(target: LockTarget): Promise<CheckedOutRecord | null> {
    const bytes = await this.readBytes(target);
    if (bytes === null) return null;

    const record = this.parse(target, bytes);
    const file = this.pathFor(target);
    await withIo(target.label, file, "deleting lock file", () => removeFileDurable(file));
    return { record, bytes };
  }

  /** Remove the lock file without reading it (works on malformed files too). */
  async discard(target: LockTarget): Promise<boolean> {
    const file = this.pathFor(target);
    return withIo(target.label, file, "deleting lock file", () => removeFileDurable(file));
  }

  /** Put a checked-out record back exactly as it was. */
  async restore(target: LockTarget, previous: CheckedOutRecord): Promise<void> {
    const file = this.pathFor(target);
    await withIo(target.label, file, "restoring lock file", () => writeFileAtomic(file, previous.bytes));
  }

  private async readBytes(target: LockTarget): Promise<Buffer | null> {
    const file = this.pathFor(target);
    try {
      return await readFile(file);
    } catch (e) {
      if (isMissingFileError(e)) return null;
      throw new IOError(target.label, file, `reading lock file failed (${describeCause(e)})`, { cause: e });
    }
  }

  private parse(target: LockTarget, bytes: Buffer): LockRecord {
    const file = this.pathFor(target);
    let data: unknown;
    try {
      data = JSON.parse(bytes.toString("utf8"));
    } catch (e) {
      throw new IOError(target.label, file, "lock file is not valid JSON", { cause: e, malformed: true });
    }

    const { valid, errors } = this.registry.validate("lockfile", data);
    if (!valid || !isSerializedLockRecord(data)) {
      throw new IOError(target.label, file, `lock file does not match schema (${errors ?? "unexpected shape"})`, {
        malformed: true,
      });
    }

    try {
      return deserializeLockRecord(data);
    } catch (e) {
      throw new IOError(target.label, file, `lock file is invalid (${describeCause(e)})`, { cause: e, malformed: true });
    }
  }
}

/** Canonical text form: fixed key order, sorted dependencies, trailing newline. */
export function serializeLockRecord(record: LockRecord): string {
  const deps: Record<string, string> = {};
  const names = Object.keys(record.dependencySignatures).sort(compareCodeUnits);
  for (const name of names) {
    if (!isDependencyName(name)) continue;
    const sig = record.dependencySignatures[name];
    if (sig !== undefined) deps[name] = sig;
  }

  const serialized: SerializedLockRecord = {
    ownSignature: record.ownSignature ?? "",
    dependencySignatures: deps,
  };
  return JSON.stringify(serialized, null, 2) + "\n";
}

export function deserializeLockRecord(data: SerializedLockRecord): LockRecord {
  const dependencySignatures: DependencySignatures = {};
  for (const name of Object.keys(data.dependencySignatures).sort(compareCodeUnits)) {
    if (!isDependencyName(name)) {
      throw new Error(`unknown dependency "${name}"`);
    }
    dependencySignatures[name] = toSignature(data.dependencySignatures[name]);
  }

  return {
    ownSignature: data.ownSignature === "" ? null : toSignature(data.ownSignature),
    dependencySignatures,
  };
}

function isSerializedLockRecord(data: unknown): data is SerializedLockRecord {
  if (typeof data !== "object" || data === null) return false;
  if (!("ownSignature" in data) || typeof data.ownSignature !== "string") return false;
  if (!("dependencySignatures" in data)) return false;
  const deps = data.dependencySignatures;
  return (
    typeof deps === "object" && deps !== null && Object.values(deps).every((v) => typeof v === "string")
  );
}
