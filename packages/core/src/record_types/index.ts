export type {
  UserRole,
  AdminTier,
  ProblemStatus,
  ReportStatus,
  ReviewDecision,
  MediaKind,
  UserRecord,
  ProblemListRecord,
  ProblemRecord,
  ReportRecord,
  ReportReviewRecord,
  ReportMediaRecord,
  ActEntryRecord,
  StaffMemberRecord,
} from './records';
