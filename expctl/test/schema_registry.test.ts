import { describe, expect, it } from "vitest";
import { createRegistry } from "../src/schema/registry.js";

const SIG = "0".repeat(128);

describe("schema registry", () => {
  it("returns the same registry for the default directory", () => {
    expect(createRegistry()).toBe(createRegistry());
  });

  it("validates lock records", () => {
    const registry = createRegistry();
    expect(registry.validate("lockfile", { ownSignature: SIG, dependencySignatures: { corpus: SIG } })).toEqual({
      valid: true,
      errors: null,
    });
    expect(registry.validate("lockfile", { ownSignature: "", dependencySignatures: {} }).valid).toBe(true);

    const bad = registry.validate("lockfile", { ownSignature: SIG, dependencySignatures: {}, extra: 1 });
    expect(bad.valid).toBe(false);
    expect(bad.errors).toContain("must NOT have additional properties");
  });

  it("throws for an unknown schema", () => {
    expect(() => createRegistry().getValidator("manifest")).toThrow("Schema not found: manifest");
  });
});
