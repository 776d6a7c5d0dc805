/** Content signature — lowercase hex sha512 digest (128 chars). */
export type Signature = string & { readonly __brand: "Signature" };

export const SIGNATURE_HEX_LENGTH = 128;

const SIGNATURE_RE = /^[0-9a-f]{128}$/;

export function isSignature(value: unknown): value is Signature {
  return typeof value === "string" && SIGNATURE_RE.test(value);
}

/** Narrow a hex string to a Signature, or throw. */
export function toSignature(value: string): Signature {
  if (!isSignature(value)) {
    throw new Error(`Not a signature (expected ${SIGNATURE_HEX_LENGTH} lowercase hex chars): ${JSON.stringify(value)}`);
  }
  return value;
}

/** Short form for messages: first 12 hex chars. */
export function shortSignature(sig: Signature | null | undefined): string {
  return sig ? sig.slice(0, 12) : "(none)";
}
