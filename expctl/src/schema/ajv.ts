import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

let shared: AjvInstance | null = null;

/** Create (once) the 2020-12 validator used for config and lock files. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  // ajv ships CommonJS; its default export is the constructor itself at runtime.
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}

/** One-line error summary, e.g. `data/ownSignature must match pattern "..."`. */
export function formatAjvErrors(ajv: AjvInstance, errors: unknown): string {
  return ajv.errorsText(errors, { separator: "; ", dataVar: "data" });
}
