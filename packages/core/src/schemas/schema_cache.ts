import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigError, DetailedValidationError } from "../errors/errors";

/** YAML schema files shipped in `./definitions`. */
export type SchemaName =
  | "project_definition_schema"
  | "project_store_schema"
  | "tally_config_schema";

export type SchemaFieldError = {
  field: string;
  message: string;
  value: unknown;
};

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Process-wide cache of compiled validators, so each YAML schema is read
 * and compiled by AJV once.
 */
export class SchemaValidationCache {
  private static validators = new Map<SchemaName, ValidateFunction>();
  private static ajv: Ajv | null = null;

  static schemaPath(name: SchemaName): string {
    return path.join(__dirname, "definitions", `${name}.yaml`);
  }

  /**
   * Gets or creates the validator for a schema.
   * @throws ConfigError when the schema file cannot be read or is not an object
   */
  static getValidator(name: SchemaName): ValidateFunction {
    const cached = this.validators.get(name);
    if (cached) return cached;

    if (!this.ajv) {
      // verbose: keep the offending value on each error
      this.ajv = new Ajv({ allErrors: true, allowUnionTypes: true, verbose: true });
      addFormats(this.ajv);
    }

    const schemaPath = this.schemaPath(name);
    let schema: unknown;
    try {
      schema = yaml.load(fs.readFileSync(schemaPath, "utf8"));
    } catch (error) {
      throw new ConfigError(
        `Cannot load schema ${name}: ${error instanceof Error ? error.message : String(error)}`,
        schemaPath
      );
    }
    if (!isSchemaObject(schema)) {
      throw new ConfigError(`Schema ${name} is not an object`, schemaPath);
    }

    const validator = this.ajv.compile(schema);
    this.validators.set(name, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: SchemaName[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: [...this.validators.keys()],
    };
  }
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): SchemaFieldError[] {
  return (errors ?? []).map(error => ({
    field: error.instancePath || error.schemaPath || "root",
    message: error.message || "Validation failed",
    value: error.data,
  }));
}

/**
 * Runs a schema and reports whether `data` conforms. Callers wrap this in
 * their own type guard for the document type the schema describes.
 */
export function conformsTo(name: SchemaName, data: unknown): boolean {
  return SchemaValidationCache.getValidator(name)(data);
}

/**
 * Builds the error for the last failed `conformsTo(name, ...)` call.
 */
export function schemaError(name: SchemaName, documentType: string, source?: string): DetailedValidationError {
  const errors = SchemaValidationCache.getValidator(name).errors;
  return new DetailedValidationError(documentType, formatSchemaErrors(errors), source);
}
