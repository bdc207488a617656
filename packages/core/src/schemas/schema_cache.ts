import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

/**
 * YAML schema files shipped next to this module.
 */
export const SchemaFiles = {
  counters: "counters_schema.yaml",
  syncState: "sync_state_schema.yaml",
  config: "config_schema.yaml",
} as const;

export type SchemaName = keyof typeof SchemaFiles;

export function getSchemaPath(name: SchemaName): string {
  return path.join(__dirname, SchemaFiles[name]);
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Singleton cache for schema validators to avoid repeated I/O and AJV compilation.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   * @returns Compiled AJV validator function
   */
  static getValidator<T = unknown>(schemaPath: string): ValidateFunction<T> {
    let validator = this.validators.get(schemaPath);
    if (!validator) {
      const schemaContent = fs.readFileSync(schemaPath, "utf8");
      const schema = yaml.load(schemaContent);
      if (!isSchemaObject(schema)) {
        throw new Error(`Schema file ${schemaPath} does not contain a schema object`);
      }
      validator = this.getAjv().compile(schema);
      this.validators.set(schemaPath, validator);
    }
    return validator as ValidateFunction<T>;
  }

  /**
   * Validator for one of the bundled schemas.
   */
  static getSchemaValidator<T = unknown>(name: SchemaName): ValidateFunction<T> {
    return this.getValidator<T>(getSchemaPath(name));
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  /**
   * Gets cache statistics for monitoring.
   */
  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys()),
    };
  }
}

/**
 * One line per AJV error, e.g. "/spec_number must be >= 0".
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "unknown schema violation";
  }
  return errors
    .map((error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`)
    .join("; ");
}
