import Ajv from "ajv";
import type { SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

/**
 * Directory holding the YAML schemas. Same relative depth from src/ and dist/.
 */
export const SCHEMA_DIR = path.resolve(__dirname, "../../schemas");

export type SchemaName =
  | "problem_import_row"
  | "staff_import_row"
  | "report_media"
  | "config";

export function schemaPath(name: SchemaName): string {
  return path.join(SCHEMA_DIR, `${name}_schema.yaml`);
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

  /**
   * Gets or creates a cached validator for the specified schema path.
   * @param schemaPath Absolute path to the YAML schema file
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) {
      return cached;
    }

    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true, allowUnionTypes: true });
      addFormats(this.ajv);
    }

    const schemaContent = fs.readFileSync(schemaPath, "utf8");
    const schema = yaml.load(schemaContent);
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema at ${schemaPath} is not a YAML mapping`);
    }
    const validator = this.ajv.compile(schema);

    this.validators.set(schemaPath, validator);
    return validator;
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
      schemasLoaded: Array.from(this.validators.keys())
    };
  }
}
