export {
  SchemaValidationCache,
  SchemaFiles,
  getSchemaPath,
  formatSchemaErrors,
} from "./schema_cache";
export type { SchemaName } from "./schema_cache";
