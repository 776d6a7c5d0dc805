import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { formatAjvErrors, loadAjv, type AjvValidateFn } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry — discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private validators = new Map<string, AjvValidateFn>();

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      // "lockfile.schema.json" → "lockfile"
      this.schemas.set(file.replace(/\.schema\.json$/, ""), schema);
    }
  }

  /** Compile and cache a validator for the given schema name. */
  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    if (!this.schemas.has(name)) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = loadAjv().compile(this.schemas.get(name));
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. */
  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : formatAjvErrors(loadAjv(), validate.errors),
    };
  }
}

let defaultRegistry: SchemaRegistry | null = null;

/** Create and load a registry; the bundled schemas directory is loaded once and shared. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  if (schemaDir === undefined && defaultRegistry) return defaultRegistry;

  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  registry.load();
  if (schemaDir === undefined) defaultRegistry = registry;
  return registry;
}
