import type {
  ReportRecord,
  ReportReviewRecord,
  ReportMediaRecord,
  ReviewDecision,
} from '../record_types';
import {
  generateReportId,
  generateReviewId,
  generateMediaId,
} from '../utils/id_generator';
import type { ReportMediaInput } from '../validation';

export function createReportRecord(payload: {
  problemId: string;
  submitterUserId: string;
  caption?: string | null;
  now: Date;
}): ReportRecord {
  const caption = payload.caption?.trim();
  return {
    id: generateReportId(payload.now.getTime()),
    problemId: payload.problemId,
    submitterUserId: payload.submitterUserId,
    status: 'pending',
    adminReason: null,
    decidingAdminId: null,
    submittedAt: payload.now.toISOString(),
    escalatedAt: null,
    caption: caption ? caption : null,
  };
}

export function createReviewRecord(payload: {
  reportId: string;
  adminId: string;
  decision: ReviewDecision;
  reason?: string | null;
  now: Date;
}): ReportReviewRecord {
  return {
    id: generateReviewId(payload.reportId, payload.adminId),
    reportId: payload.reportId,
    adminId: payload.adminId,
    decision: payload.decision,
    reason: payload.reason ?? null,
    createdAt: payload.now.toISOString(),
  };
}

export function createMediaRecords(reportId: string, media: ReportMediaInput[]): ReportMediaRecord[] {
  return media.map((item, index) => ({
    id: generateMediaId(reportId, index),
    reportId,
    kind: item.kind,
    fileRef: item.fileRef ?? null,
    path: item.path ?? null,
    caption: item.caption ?? null,
  }));
}
