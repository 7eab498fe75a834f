import type { RecordStores } from '../record_store';
import type { ProblemListRecord, ReviewDecision, UserRecord } from '../record_types';
import type { Notifier } from '../notifier';
import type { DocumentRenderer } from '../document_renderer';
import type { LogLevel } from '../logger';
import type { Clock } from '../utils/date_utils';
import type { AdminTierResolver, MainAdminIdsProvider } from '../adapters/identity_adapter';
import type { SubmitReportInput } from '../adapters/report_adapter';
import type { VoteResult, VoteSummaryEntry } from '../adapters/review_adapter';
import type { DueReminder } from '../adapters/reminder_adapter';
import type { ActSweepEntry } from '../adapters/act_adapter';
import type { DeliveryOutcome } from '../adapters/notification_adapter';

import { EntityStore } from '../entity_store';
import { EventBus } from '../event_bus';
import { AggregateLock } from '../transaction';
import { createLogger } from '../logger';
import { systemClock } from '../utils/date_utils';
import {
  IdentityAdapter,
  ConfigAdminTierResolver,
  staticMainAdminIds,
} from '../adapters/identity_adapter';
import { ProblemAdapter } from '../adapters/problem_adapter';
import { ReviewAdapter } from '../adapters/review_adapter';
import { ReportAdapter } from '../adapters/report_adapter';
import { ReminderAdapter } from '../adapters/reminder_adapter';
import { ActAdapter } from '../adapters/act_adapter';
import { NotificationAdapter } from '../adapters/notification_adapter';

export type RemedyDependencies = {
  stores: RecordStores;
  notifier: Notifier;
  renderer: DocumentRenderer;
  /** Main-tier admin ids, or a provider read on every classification */
  mainAdminIds?: string[] | MainAdminIdsProvider;
  /** Replaces the config-based tier classification entirely */
  tierResolver?: AdminTierResolver;
  reminderWindowDays?: number;
  clock?: Clock;
  logLevel?: LogLevel;
};

export type SubmitReportOptions = Omit<SubmitReportInput, 'problemId' | 'submitterUserId'>;

/**
 * Remedy - one wired instance of every adapter over a shared store,
 * event bus and lock table.
 */
export class Remedy {
  readonly entityStore: EntityStore;
  readonly eventBus: EventBus;
  readonly lock: AggregateLock;
  readonly tierResolver: AdminTierResolver;

  readonly identity: IdentityAdapter;
  readonly problems: ProblemAdapter;
  readonly reviews: ReviewAdapter;
  readonly reports: ReportAdapter;
  readonly reminders: ReminderAdapter;
  readonly acts: ActAdapter;
  readonly notifications: NotificationAdapter;

  constructor(dependencies: RemedyDependencies) {
    const clock = dependencies.clock ?? systemClock;
    const level = dependencies.logLevel;
    const logger = (prefix: string) => createLogger(prefix, level);

    this.entityStore = new EntityStore(dependencies.stores);
    this.eventBus = new EventBus({ logger: logger('[EventBus] ') });
    this.lock = new AggregateLock();

    const mainAdminIds = dependencies.mainAdminIds ?? [];
    this.tierResolver = dependencies.tierResolver ?? new ConfigAdminTierResolver({
      entityStore: this.entityStore,
      mainAdminIds: Array.isArray(mainAdminIds) ? staticMainAdminIds(mainAdminIds) : mainAdminIds,
    });

    const shared = {
      entityStore: this.entityStore,
      eventBus: this.eventBus,
      lock: this.lock,
      clock,
    };

    this.identity = new IdentityAdapter({ entityStore: this.entityStore, clock, logger: logger('[Identity] ') });
    this.problems = new ProblemAdapter({ ...shared, logger: logger('[Problems] ') });
    this.reviews = new ReviewAdapter({
      ...shared,
      problemAdapter: this.problems,
      tierResolver: this.tierResolver,
      logger: logger('[Review] '),
    });
    this.reports = new ReportAdapter({
      ...shared,
      problemAdapter: this.problems,
      identityAdapter: this.identity,
      escalation: this.reviews,
      logger: logger('[Reports] '),
    });
    this.reminders = new ReminderAdapter({
      entityStore: this.entityStore,
      notifier: dependencies.notifier,
      windowDays: dependencies.reminderWindowDays,
      logger: logger('[Reminders] '),
    });
    this.acts = new ActAdapter({
      ...shared,
      renderer: dependencies.renderer,
      logger: logger('[Acts] '),
    });
    this.notifications = new NotificationAdapter({
      entityStore: this.entityStore,
      eventBus: this.eventBus,
      notifier: dependencies.notifier,
      tierResolver: this.tierResolver,
      logger: logger('[Notify] '),
    });
  }

  // ─── Operations ─────────────────────────────────────────

  upsertProblems(listCode: string, rows: unknown, listTitle?: string): Promise<ProblemListRecord> {
    return this.problems.upsertProblems(listCode, rows, listTitle);
  }

  submitReport(problemId: string, submitterUserId: string, options: SubmitReportOptions = {}): Promise<string> {
    return this.reports.submitReport({ ...options, problemId, submitterUserId });
  }

  castVote(reportId: string, adminId: string, decision: ReviewDecision, reason?: string | null): Promise<VoteResult> {
    return this.reviews.castVote(reportId, adminId, decision, reason);
  }

  getVoteSummary(reportId: string): Promise<VoteSummaryEntry[]> {
    return this.reviews.getVoteSummary(reportId);
  }

  /**
   * Grants or revokes admin rights, then escalates pending reports the new
   * roster makes unanimous.
   */
  async setAdmin(userId: string, makeAdmin: boolean): Promise<UserRecord> {
    const user = await this.identity.setAdmin(userId, makeAdmin);
    await this.reviews.recheckEscalations();
    return user;
  }

  recheckEscalations(): Promise<string[]> {
    return this.reviews.recheckEscalations();
  }

  dueReminders(today: string | Date): Promise<DueReminder[]> {
    return this.reminders.dueReminders(today);
  }

  sendDueReminders(today: string | Date): Promise<DeliveryOutcome> {
    return this.reminders.sendDueReminders(today);
  }

  runActSweep(): Promise<ActSweepEntry[]> {
    return this.acts.runActSweep();
  }

  /**
   * Resolves once every notification triggered so far has been attempted.
   */
  waitForIdle(): Promise<void> {
    return this.eventBus.waitForIdle();
  }

  async dispose(): Promise<void> {
    await this.eventBus.waitForIdle();
    this.notifications.dispose();
    this.eventBus.clearSubscriptions();
  }
}

export function createRemedy(dependencies: RemedyDependencies): Remedy {
  return new Remedy(dependencies);
}
