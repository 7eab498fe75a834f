import type {
  ProblemListRecord,
  ProblemRecord,
  ProblemStatus,
  ReviewDecision,
} from '../../record_types';
import type { EntityStore, DeleteListResult } from '../../entity_store';
import type { IEventStream } from '../../event_bus';
import type { AggregateLock } from '../../transaction';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';

/**
 * Counts of problems per status.
 */
export type ProblemStats = {
  total: number;
  inProgress: number;
  reportSent: number;
  accepted: number;
  rejected: number;
};

export type SubmissionTransition = {
  problem: ProblemRecord;
  previousStatus: ProblemStatus;
  /** Report that was live before this one, now superseded */
  supersededReportId: string | null;
};

export type DecisionTransition = {
  problem: ProblemRecord;
  /** False when the decided report was no longer the problem's live report */
  applied: boolean;
  /** True when the acceptance closed the owning list */
  listClosed: boolean;
};

/**
 * ProblemAdapter Interface - the problem lifecycle
 */
export interface IProblemAdapter {
  // Import
  upsertProblems(listCode: string, rows: unknown, listTitle?: string): Promise<ProblemListRecord>;

  // Transitions
  markReportSent(problemId: string, reportId: string): Promise<SubmissionTransition>;
  applyDecision(
    problemId: string,
    reportId: string,
    decision: ReviewDecision,
    reason?: string | null
  ): Promise<DecisionTransition>;
  closeListIfComplete(listId: string): Promise<boolean>;

  // Queries
  getProblem(problemId: string): Promise<ProblemRecord | null>;
  getProblemByNumber(listCode: string, number: number): Promise<ProblemRecord | null>;
  listProblems(listCode: string): Promise<ProblemRecord[]>;
  getProblemsForAssignee(userId: string, options?: { onlyOpenLists?: boolean }): Promise<ProblemRecord[]>;
  getList(listCode: string): Promise<ProblemListRecord | null>;
  listLists(options?: { onlyOpen?: boolean }): Promise<ProblemListRecord[]>;

  // Statistics
  getListStats(listCode: string): Promise<ProblemStats>;
  getAssigneeStats(userId: string): Promise<ProblemStats>;

  // Administrative
  deleteList(listCode: string): Promise<DeleteListResult>;
}

/**
 * ProblemAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface ProblemAdapterDependencies {
  entityStore: EntityStore;
  lock: AggregateLock;

  // Optional: Event Bus for event-driven integration
  eventBus?: IEventStream;
  clock?: Clock;
  logger?: Logger;
}
