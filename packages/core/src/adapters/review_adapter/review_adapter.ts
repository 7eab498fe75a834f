import type { ReportRecord, ReviewDecision, AdminTier } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type {
  IEventStream,
  ReportEscalatedEvent,
  ReportFinalizedEvent,
} from '../../event_bus';
import type { AggregateLock } from '../../transaction';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type { AdminTierResolver } from '../identity_adapter';
import type { IProblemAdapter } from '../problem_adapter';
import type {
  IReviewAdapter,
  ReviewAdapterDependencies,
  VoteResult,
  VoteSummaryEntry,
} from './review_adapter.types';

import { createReviewRecord } from '../../record_factories';
import {
  AlreadyFinalizedError,
  RecordNotFoundError,
  UnknownAdminError,
} from '../../errors';
import { lockKeys } from '../../transaction';
import { createLogger } from '../../logger';
import { systemClock } from '../../utils/date_utils';
import { DEFAULT_REJECTION_REASON } from '../problem_adapter';

const TIER_ORDER: Record<AdminTier, number> = { main: 0, regular: 1 };

/**
 * ReviewAdapter - decides the outcome of a report.
 *
 * - a rejection by any admin finalizes the report as rejected
 * - an approval by a main admin finalizes it as accepted
 * - approvals by regular admins count toward unanimity; once every
 *   regular admin has approved, the report is forwarded to the main admins
 *   (at most once, guarded by `escalatedAt`)
 *
 * Each vote runs under the report's aggregate lock with `pending` as the
 * guard, so a report is finalized at most once.
 */
export class ReviewAdapter implements IReviewAdapter {
  private entityStore: EntityStore;
  private problemAdapter: IProblemAdapter;
  private tierResolver: AdminTierResolver;
  private lock: AggregateLock;
  private eventBus: IEventStream | undefined;
  private clock: Clock;
  private logger: Logger;

  constructor(dependencies: ReviewAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.problemAdapter = dependencies.problemAdapter;
    this.tierResolver = dependencies.tierResolver;
    this.lock = dependencies.lock;
    this.eventBus = dependencies.eventBus;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger('[Review] ');
  }

  async castVote(
    reportId: string,
    adminId: string,
    decision: ReviewDecision,
    reason?: string | null
  ): Promise<VoteResult> {
    return this.lock.run(lockKeys.report(reportId), async () => {
      const report = await this.requireReport(reportId);

      const tier = await this.tierResolver.tierOf(adminId);
      if (tier === null) {
        throw new UnknownAdminError(adminId);
      }
      if (report.status !== 'pending') {
        throw new AlreadyFinalizedError(reportId, report.status);
      }

      await this.entityStore.upsertReview(createReviewRecord({
        reportId,
        adminId,
        decision,
        reason: reason ?? null,
        now: this.clock(),
      }));
      this.logger.debug(`${tier} admin ${adminId} voted ${decision} on report ${reportId}`);

      if (decision === 'rejected') {
        await this.finalize(report, 'rejected', adminId, reason || DEFAULT_REJECTION_REASON);
        return { finalized: true, escalated: false, status: 'rejected' };
      }

      if (tier === 'main') {
        await this.finalize(report, 'accepted', adminId, null);
        return { finalized: true, escalated: false, status: 'accepted' };
      }

      const escalated = report.escalatedAt === null && await this.isUnanimous(reportId);
      if (escalated) {
        await this.escalate(report);
      }
      return { finalized: false, escalated, status: 'pending' };
    });
  }

  /**
   * Escalates a pending, not yet escalated report whose regular admins are
   * already unanimous. At submission this holds only when there are no
   * regular admins.
   */
  async checkEscalation(reportId: string): Promise<boolean> {
    return this.lock.run(lockKeys.report(reportId), async () => {
      const report = await this.requireReport(reportId);
      if (report.status !== 'pending' || report.escalatedAt !== null) {
        return false;
      }
      if (!(await this.isUnanimous(reportId))) {
        return false;
      }
      await this.escalate(report);
      return true;
    });
  }

  /**
   * Runs the escalation check for every live pending report that has not
   * been escalated. Needed after the admin roster changes, since a smaller
   * regular tier can be unanimous without any new vote.
   */
  async recheckEscalations(): Promise<string[]> {
    const escalated: string[] = [];
    for (const report of await this.entityStore.findReports()) {
      if (report.status !== 'pending' || report.escalatedAt !== null) continue;
      const problem = await this.entityStore.getProblem(report.problemId);
      if (problem?.lastReportId !== report.id) continue;
      if (await this.checkEscalation(report.id)) {
        escalated.push(report.id);
      }
    }
    return escalated;
  }

  /**
   * Per-admin breakdown: every current admin plus anyone who voted,
   * main tier first, then by id.
   */
  async getVoteSummary(reportId: string): Promise<VoteSummaryEntry[]> {
    await this.requireReport(reportId);

    const admins = await this.tierResolver.listAdmins();
    const reviews = await this.entityStore.findReviewsForReport(reportId);
    const decisions = new Map(reviews.map(review => [review.adminId, review.decision]));

    const entries: VoteSummaryEntry[] = admins.map(admin => ({
      adminId: admin.adminId,
      tier: admin.tier,
      decision: decisions.get(admin.adminId) ?? 'pending',
    }));

    const known = new Set(admins.map(admin => admin.adminId));
    for (const review of reviews) {
      if (!known.has(review.adminId)) {
        entries.push({ adminId: review.adminId, tier: null, decision: review.decision });
      }
    }

    const rank = (tier: AdminTier | null) => (tier === null ? 2 : TIER_ORDER[tier]);
    return entries.sort((a, b) => rank(a.tier) - rank(b.tier) || a.adminId.localeCompare(b.adminId));
  }

  // ─── Helpers ────────────────────────────────────────────

  /**
   * Recomputed from scratch: the set of regular admins equals the set of
   * regular admins with an approval, and nobody rejected.
   */
  private async isUnanimous(reportId: string): Promise<boolean> {
    const admins = await this.tierResolver.listAdmins();
    const regularIds = admins.filter(admin => admin.tier === 'regular').map(admin => admin.adminId);
    const reviews = await this.entityStore.findReviewsForReport(reportId);

    if (reviews.some(review => review.decision === 'rejected')) {
      return false;
    }
    const approved = new Set(
      reviews.filter(review => review.decision === 'approved').map(review => review.adminId)
    );
    return regularIds.every(id => approved.has(id));
  }

  private async escalate(report: ReportRecord): Promise<void> {
    await this.entityStore.updateReport(report.id, { escalatedAt: this.clock().toISOString() });

    const admins = await this.tierResolver.listAdmins();
    const mainAdminIds = admins.filter(admin => admin.tier === 'main').map(admin => admin.adminId);
    if (mainAdminIds.length === 0) {
      this.logger.warn(`report ${report.id} escalated but there is no main admin to accept it`);
    } else {
      this.logger.info(`report ${report.id} escalated to ${mainAdminIds.length} main admins`);
    }

    if (this.eventBus) {
      const event: ReportEscalatedEvent = {
        type: 'report.escalated',
        timestamp: this.clock().getTime(),
        source: 'review_adapter',
        payload: { reportId: report.id, problemId: report.problemId, mainAdminIds },
      };
      this.eventBus.publish(event);
    }
  }

  /**
   * Moves the problem first, so a failed transition leaves the report pending.
   */
  private async finalize(
    report: ReportRecord,
    status: 'accepted' | 'rejected',
    adminId: string,
    reason: string | null
  ): Promise<void> {
    await this.problemAdapter.applyDecision(
      report.problemId,
      report.id,
      status === 'accepted' ? 'approved' : 'rejected',
      reason
    );

    await this.entityStore.updateReport(report.id, {
      status,
      adminReason: reason,
      decidingAdminId: adminId,
    });
    this.logger.info(`report ${report.id} ${status} by ${adminId}`);

    if (this.eventBus) {
      const event: ReportFinalizedEvent = {
        type: 'report.finalized',
        timestamp: this.clock().getTime(),
        source: 'review_adapter',
        payload: {
          reportId: report.id,
          problemId: report.problemId,
          submitterUserId: report.submitterUserId,
          status,
          decidingAdminId: adminId,
          reason,
        },
      };
      this.eventBus.publish(event);
    }
  }

  private async requireReport(reportId: string): Promise<ReportRecord> {
    const report = await this.entityStore.getReport(reportId);
    if (!report) {
      throw new RecordNotFoundError('Report', reportId);
    }
    return report;
  }
}
