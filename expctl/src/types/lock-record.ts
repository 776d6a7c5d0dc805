import type { Signature } from "./signature.js";
import type { DependencyName } from "./stage.js";

export type DependencySignatures = Partial<Record<DependencyName, Signature>>;

/** Persisted proof of a stage's last successful run. Never mutated in place. */
export type LockRecord = {
  readonly ownSignature: Signature | null;
  readonly dependencySignatures: Readonly<DependencySignatures>;
};

/** On-disk shape of the lock file (`ownSignature` is "" when absent). */
export type SerializedLockRecord = {
  ownSignature: string;
  dependencySignatures: Record<string, string>;
};

/** A lock record taken off disk by the store, with its exact bytes. */
export type CheckedOutRecord = {
  readonly record: LockRecord;
  readonly bytes: Buffer;
};
