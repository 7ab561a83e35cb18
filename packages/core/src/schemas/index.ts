export {
  SchemaValidationCache,
  conformsTo,
  formatSchemaErrors,
  schemaError,
} from "./schema_cache";
export type { SchemaName, SchemaFieldError } from "./schema_cache";
