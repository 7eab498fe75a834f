/**
 * Persisted record shapes.
 *
 * Every record is a plain JSON object keyed by `id`. Timestamps are ISO-8601
 * strings; calendar dates are `YYYY-MM-DD` strings.
 */

export type UserRole = 'user' | 'admin';

export type AdminTier = 'regular' | 'main';

export type ProblemStatus = 'in_progress' | 'report_sent' | 'accepted' | 'rejected';

export type ReportStatus = 'pending' | 'accepted' | 'rejected';

export type ReviewDecision = 'approved' | 'rejected';

export type MediaKind = 'photo' | 'video' | 'document' | 'text' | 'audio' | 'voice' | 'other';

/**
 * A person known to the system. `id` is the external messaging account id.
 * Admin tier is not stored here; see AdminTierResolver.
 */
export type UserRecord = {
  id: string;
  role: UserRole;
  username?: string;
  firstName?: string;
  lastName?: string;
  createdAt: string;
};

export type ProblemListRecord = {
  id: string;
  /** Human-chosen, unique across lists */
  code: string;
  title: string;
  /** True once every problem of a non-empty list is accepted. Never reverts. */
  isClosed: boolean;
  closedAt: string | null;
  createdAt: string;
};

export type ProblemRecord = {
  id: string;
  listId: string;
  /** Unique within the owning list */
  number: number;
  title: string;
  assignees: string[];
  /** Raw value from import; may be malformed */
  dueDate: string | null;
  status: ProblemStatus;
  /** Rejection reason while rejected */
  note: string | null;
  /** The most recent report, whose outcome governs `status` */
  lastReportId: string | null;
};

export type ReportRecord = {
  id: string;
  problemId: string;
  submitterUserId: string;
  status: ReportStatus;
  adminReason: string | null;
  decidingAdminId: string | null;
  submittedAt: string;
  /** Set once the report has been forwarded to main admins */
  escalatedAt: string | null;
  caption: string | null;
};

/**
 * One admin's current vote on one report. A repeat vote overwrites it.
 */
export type ReportReviewRecord = {
  id: string;
  reportId: string;
  adminId: string;
  decision: ReviewDecision;
  reason: string | null;
  createdAt: string;
};

export type ReportMediaRecord = {
  id: string;
  reportId: string;
  kind: MediaKind;
  fileRef: string | null;
  path: string | null;
  caption: string | null;
};

/**
 * Marks that a certificate covering `problemId` was issued to `assigneeId`.
 */
export type ActEntryRecord = {
  id: string;
  problemId: string;
  assigneeId: string;
  createdAt: string;
};

export type StaffMemberRecord = {
  id: string;
  assigneeId: string;
  post: string | null;
  fio: string | null;
};
