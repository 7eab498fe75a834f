import type { ReportRecord, ReportMediaRecord } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { IEventStream } from '../../event_bus';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type { IIdentityAdapter } from '../identity_adapter';
import type { IProblemAdapter } from '../problem_adapter';
import type { IEscalationCheck } from '../review_adapter';

export type SubmitReportInput = {
  problemId: string;
  submitterUserId: string;
  /** Profile of the submitter as seen by the transport */
  submitter?: {
    username?: string;
    firstName?: string;
    lastName?: string;
  };
  caption?: string | null;
  /** Media metadata; validated against the report_media schema */
  media?: unknown;
};

export type ReportStatsEntry = {
  problemId: string;
  title: string;
  total: number;
  accepted: number;
  rejected: number;
};

/**
 * ReportAdapter Interface - report intake and lookup
 */
export interface IReportAdapter {
  submitReport(input: SubmitReportInput): Promise<string>;
  getReport(reportId: string): Promise<ReportRecord | null>;
  listReportsForProblem(problemId: string): Promise<ReportRecord[]>;
  getReportMedia(reportId: string): Promise<ReportMediaRecord[]>;
  getReportStats(): Promise<ReportStatsEntry[]>;
}

/**
 * ReportAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface ReportAdapterDependencies {
  entityStore: EntityStore;
  problemAdapter: IProblemAdapter;
  identityAdapter: IIdentityAdapter;
  escalation: IEscalationCheck;

  // Optional: Event Bus for event-driven integration
  eventBus?: IEventStream;
  clock?: Clock;
  logger?: Logger;
}
