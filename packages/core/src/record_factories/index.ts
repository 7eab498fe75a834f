export {
  createProblemListRecord,
  createProblemRecord,
  importedProblemFields,
  normalizeAssignees,
} from './problem_factory';
export {
  createReportRecord,
  createReviewRecord,
  createMediaRecords,
} from './report_factory';
export { assertExternalId, createUserRecord, createStaffMemberRecord } from './identity_factory';
export type { UserProfile } from './identity_factory';
export { createActEntryRecord } from './act_factory';
