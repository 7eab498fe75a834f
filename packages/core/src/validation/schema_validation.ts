import { SchemaValidationCache, schemaPath } from './schema-cache';
import type { SchemaName } from './schema-cache';

/**
 * Validation error interface
 */
export interface ValidationError {
  field: string;
  message: string;
  value: unknown;
}

/**
 * Validation result interface
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Runs the named schema against `data` and flattens ajv errors into
 * field-level entries. `fieldPrefix` locates the value inside a batch.
 */
export function validateAgainstSchema(
  name: SchemaName,
  data: unknown,
  fieldPrefix = ''
): ValidationResult {
  const validator = SchemaValidationCache.getValidator(schemaPath(name));
  const isValid = validator(data);

  if (!isValid && validator.errors) {
    const errors: ValidationError[] = validator.errors.map(error => {
      const missing = error.params['missingProperty'];
      const field = error.instancePath.replace(/^\//, '')
        || (typeof missing === 'string' ? missing : '')
        || 'root';
      return {
        field: fieldPrefix ? `${fieldPrefix}.${field}` : field,
        message: error.message || 'Unknown validation error',
        value: error.data,
      };
    });

    return { isValid: false, errors };
  }

  return { isValid: true, errors: [] };
}

/**
 * Validates every element of a batch; errors carry `rows[i].` prefixes.
 */
export function validateBatch(name: SchemaName, rows: unknown): ValidationResult {
  if (!Array.isArray(rows)) {
    return {
      isValid: false,
      errors: [{ field: 'rows', message: 'must be array', value: rows }],
    };
  }

  const errors: ValidationError[] = [];
  rows.forEach((row: unknown, index) => {
    errors.push(...validateAgainstSchema(name, row, `rows[${index}]`).errors);
  });
  return { isValid: errors.length === 0, errors };
}
