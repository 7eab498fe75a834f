import { randomBytes } from 'crypto';

/**
 * External identities (messaging account ids, staff ids) become part of
 * record ids and file names, so they are restricted to a safe alphabet.
 */
const EXTERNAL_ID_PATTERN = /^[A-Za-z0-9_@.-]{1,64}$/;

export function isValidExternalId(id: string): boolean {
  return EXTERNAL_ID_PATTERN.test(id) && !id.includes('..');
}

/**
 * Sanitizes a string to be used in an ID slug.
 * Converts to lower-case, replaces spaces with hyphens, and removes invalid characters.
 */
function sanitizeForId(name: string): string {
  return name
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .slice(0, 50);
}

/**
 * Generates a ProblemList ID (e.g., '1700000000000-list-roof-2024').
 * Code uniqueness is checked separately; the slug only aids readability.
 */
export function generateListId(code: string, timestamp: number): string {
  const slug = sanitizeForId(code) || 'untitled';
  return `${timestamp}-list-${slug}`;
}

/**
 * Generates the Problem ID for a (list, number) pair.
 * Deterministic, so a second insert of the same pair collides in storage.
 */
export function generateProblemId(listId: string, number: number): string {
  return `${listId}-problem-${number}`;
}

/**
 * Generates a Report ID (e.g., '1700000000000-report-a1b2c3').
 */
export function generateReportId(timestamp: number): string {
  return `${timestamp}-report-${randomBytes(3).toString('hex')}`;
}

/**
 * One review per (report, admin).
 */
export function generateReviewId(reportId: string, adminId: string): string {
  return `${reportId}-review-${adminId}`;
}

/**
 * One act entry per (problem, assignee).
 */
export function generateActEntryId(problemId: string, assigneeId: string): string {
  return `${problemId}-act-${assigneeId}`;
}

export function generateMediaId(reportId: string, index: number): string {
  return `${reportId}-media-${index}`;
}

export function generateStaffId(assigneeId: string): string {
  return `staff-${assigneeId}`;
}
