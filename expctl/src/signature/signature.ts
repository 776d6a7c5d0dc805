import { createHash } from "node:crypto";
import { SIGNATURE_ALGORITHM, computeDigestFromContent, computeFileDigest } from "./checksum.js";
import { compareCodeUnits, listDataFiles, toPosixRelative, type DataFileFilter } from "./data-files.js";
import { toSignature, type Signature } from "../types/signature.js";

export type FileSetSignatureOptions = {
  /** Mixed into the signature ahead of the files (e.g. a sample's name). */
  name?: string;
};

/**
 * Signature over a set of files below `root`.
 *
 * Files are keyed by root-relative POSIX path and sorted, so input order does
 * not matter; each entry contributes `path \0 sha512(content) \n`.
 */
export async function computeFileSetSignature(
  root: string,
  files: readonly string[],
  opts: FileSetSignatureOptions = {},
): Promise<Signature> {
  const entries = files
    .map((f) => ({ abs: f, rel: toPosixRelative(root, f) }))
    .sort((a, b) => compareCodeUnits(a.rel, b.rel));

  const h = createHash(SIGNATURE_ALGORITHM);
  if (opts.name !== undefined) {
    h.update(`name\0${opts.name}\n`);
  }
  for (const entry of entries) {
    const digest = await computeFileDigest(entry.abs);
    h.update(entry.rel);
    h.update("\0");
    h.update(digest);
    h.update("\n");
  }
  return toSignature(h.digest("hex"));
}

/** Signature of raw content. */
export function computeContentSignature(content: string | Uint8Array): Signature {
  return toSignature(computeDigestFromContent(content));
}

/** Signature of every data file in a stage directory. */
export async function computeDirectorySignature(
  dir: string,
  filter: DataFileFilter,
  opts: FileSetSignatureOptions = {},
): Promise<Signature> {
  const files = await listDataFiles(dir, filter);
  return computeFileSetSignature(dir, files, opts);
}
