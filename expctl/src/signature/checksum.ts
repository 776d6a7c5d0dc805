import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";

export const SIGNATURE_ALGORITHM = "sha512";

/** Compute the sha512 hex digest of a file. */
export async function computeFileDigest(filePath: string): Promise<string> {
  const content = await readFile(filePath);
  return createHash(SIGNATURE_ALGORITHM).update(content).digest("hex");
}

/** Compute the sha512 hex digest of a string/buffer. */
export function computeDigestFromContent(content: string | Uint8Array): string {
  return createHash(SIGNATURE_ALGORITHM).update(content).digest("hex");
}
