import { DetailedValidationError } from '../errors';
import { validateAgainstSchema, validateBatch } from './schema_validation';
import type { ValidationResult } from './schema_validation';
import type { MediaKind } from '../record_types';
import type { RemedyConfig } from '../config_manager/config_manager.types';

/**
 * One row of a problem list import.
 */
export type ProblemImportRow = {
  number: number;
  title: string;
  assignees: string[];
  dueDate?: string | null;
};

/**
 * One row of the staff directory import.
 */
export type StaffImportRow = {
  assignee: string;
  post?: string | null;
  fio?: string | null;
};

/**
 * Metadata of a file attached to a report.
 */
export type ReportMediaInput = {
  kind: MediaKind;
  fileRef?: string | null;
  path?: string | null;
  caption?: string | null;
};

export function validateProblemImportRows(rows: unknown): ValidationResult {
  const result = validateBatch('problem_import_row', rows);
  if (!result.isValid || !Array.isArray(rows)) {
    return result;
  }

  // Numbers must be unique inside one import
  const seen = new Map<unknown, number>();
  rows.forEach((row: unknown, index) => {
    if (typeof row !== 'object' || row === null || !('number' in row)) return;
    const first = seen.get(row.number);
    if (first !== undefined) {
      result.errors.push({
        field: `rows[${index}].number`,
        message: `duplicates rows[${first}].number`,
        value: row.number,
      });
    } else {
      seen.set(row.number, index);
    }
  });
  return { isValid: result.errors.length === 0, errors: result.errors };
}

export function assertProblemImportRows(rows: unknown): asserts rows is ProblemImportRow[] {
  const result = validateProblemImportRows(rows);
  if (!result.isValid) {
    throw new DetailedValidationError('ProblemImportRow', result.errors);
  }
}

export function validateStaffImportRows(rows: unknown): ValidationResult {
  return validateBatch('staff_import_row', rows);
}

export function assertStaffImportRows(rows: unknown): asserts rows is StaffImportRow[] {
  const result = validateStaffImportRows(rows);
  if (!result.isValid) {
    throw new DetailedValidationError('StaffImportRow', result.errors);
  }
}

export function assertReportMedia(media: unknown): asserts media is ReportMediaInput[] {
  const result = validateBatch('report_media', media);
  if (!result.isValid) {
    throw new DetailedValidationError('ReportMedia', result.errors);
  }
}

export function validateConfigSchema(data: unknown): ValidationResult {
  return validateAgainstSchema('config', data);
}

export function assertRemedyConfig(data: unknown): asserts data is RemedyConfig {
  const result = validateConfigSchema(data);
  if (!result.isValid) {
    throw new DetailedValidationError('RemedyConfig', result.errors);
  }
}
