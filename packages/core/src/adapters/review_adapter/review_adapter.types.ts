import type { AdminTier, ReportStatus, ReviewDecision } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { IEventStream } from '../../event_bus';
import type { AggregateLock } from '../../transaction';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type { AdminTierResolver } from '../identity_adapter';
import type { IProblemAdapter } from '../problem_adapter';

export type VoteResult = {
  /** The report reached accepted or rejected on this vote */
  finalized: boolean;
  /** The report was forwarded to main admins on this vote */
  escalated: boolean;
  status: ReportStatus;
};

export type VoteSummaryEntry = {
  adminId: string;
  /** Null for a voter who is no longer an admin */
  tier: AdminTier | null;
  decision: ReviewDecision | 'pending';
};

/**
 * Forwards a report to main admins once every regular admin approved it.
 */
export interface IEscalationCheck {
  checkEscalation(reportId: string): Promise<boolean>;
}

/**
 * ReviewAdapter Interface - the two-tier approval consensus engine
 */
export interface IReviewAdapter extends IEscalationCheck {
  castVote(
    reportId: string,
    adminId: string,
    decision: ReviewDecision,
    reason?: string | null
  ): Promise<VoteResult>;
  getVoteSummary(reportId: string): Promise<VoteSummaryEntry[]>;
  recheckEscalations(): Promise<string[]>;
}

/**
 * ReviewAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface ReviewAdapterDependencies {
  entityStore: EntityStore;
  problemAdapter: IProblemAdapter;
  tierResolver: AdminTierResolver;
  lock: AggregateLock;

  // Optional: Event Bus for event-driven integration
  eventBus?: IEventStream;
  clock?: Clock;
  logger?: Logger;
}
