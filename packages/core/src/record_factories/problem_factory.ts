import type { ProblemListRecord, ProblemRecord } from '../record_types';
import { generateListId, generateProblemId } from '../utils/id_generator';
import type { ProblemImportRow } from '../validation';

/**
 * Creates an open ProblemList. The title defaults to the code.
 */
export function createProblemListRecord(
  code: string,
  title: string | undefined,
  now: Date
): ProblemListRecord {
  const trimmedCode = code.trim();
  if (!trimmedCode) {
    throw new Error('ProblemList requires a non-empty code');
  }

  return {
    id: generateListId(trimmedCode, now.getTime()),
    code: trimmedCode,
    title: title?.trim() || trimmedCode,
    isClosed: false,
    closedAt: null,
    createdAt: now.toISOString(),
  };
}

/**
 * Removes blanks and duplicates while keeping first-seen order.
 */
export function normalizeAssignees(assignees: string[]): string[] {
  const result: string[] = [];
  for (const raw of assignees) {
    const id = raw.trim();
    if (id && !result.includes(id)) {
      result.push(id);
    }
  }
  return result;
}

function normalizeDueDate(dueDate: string | null | undefined): string | null {
  const trimmed = dueDate?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Creates a Problem from an import row. New problems always start in progress.
 */
export function createProblemRecord(listId: string, row: ProblemImportRow): ProblemRecord {
  return {
    id: generateProblemId(listId, row.number),
    listId,
    number: row.number,
    title: row.title.trim(),
    assignees: normalizeAssignees(row.assignees),
    dueDate: normalizeDueDate(row.dueDate),
    status: 'in_progress',
    note: null,
    lastReportId: null,
  };
}

/**
 * Fields an import overwrites on an existing problem. Status is untouched.
 */
export function importedProblemFields(
  row: ProblemImportRow
): Pick<ProblemRecord, 'title' | 'assignees' | 'dueDate'> {
  return {
    title: row.title.trim(),
    assignees: normalizeAssignees(row.assignees),
    dueDate: normalizeDueDate(row.dueDate),
  };
}
