export { SchemaValidationCache, SCHEMA_DIR, schemaPath } from './schema-cache';
export type { SchemaName } from './schema-cache';
export { validateAgainstSchema, validateBatch } from './schema_validation';
export type { ValidationError, ValidationResult } from './schema_validation';
export {
  validateProblemImportRows,
  assertProblemImportRows,
  validateStaffImportRows,
  assertStaffImportRows,
  assertReportMedia,
  validateConfigSchema,
  assertRemedyConfig,
} from './validators';
export type {
  ProblemImportRow,
  StaffImportRow,
  ReportMediaInput,
} from './validators';
