import type { EntityStore } from '../../entity_store';
import type {
  IEventStream,
  EventSubscription,
  ReportSubmittedEvent,
  ReportEscalatedEvent,
  ReportFinalizedEvent,
  ListClosedEvent,
  ActGeneratedEvent,
} from '../../event_bus';
import type { Notification, Notifier, ProblemRef } from '../../notifier';
import type { Logger } from '../../logger';
import type { AdminTierResolver } from '../identity_adapter';

import { ExternalDeliveryError } from '../../errors';
import { createLogger } from '../../logger';

export type DeliveryOutcome = {
  sent: number;
  failed: number;
};

/**
 * NotificationAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface NotificationAdapterDependencies {
  entityStore: EntityStore;
  eventBus: IEventStream;
  notifier: Notifier;
  tierResolver: AdminTierResolver;
  logger?: Logger;
}

type Recipient = {
  channel: 'user' | 'admin';
  id: string;
};

/**
 * Builds the problem part of a notification.
 */
export async function resolveProblemRef(
  entityStore: EntityStore,
  problemId: string
): Promise<ProblemRef | null> {
  const problem = await entityStore.getProblem(problemId);
  if (!problem) {
    return null;
  }
  const list = await entityStore.getList(problem.listId);
  return {
    problemId,
    listCode: list?.code ?? '',
    listTitle: list?.title ?? '',
    problemNumber: problem.number,
    problemTitle: problem.title,
  };
}

/**
 * NotificationAdapter - turns domain events into messages.
 *
 * Runs after the state change is committed. Each recipient is tried on
 * its own; a failed delivery is logged and the rest of the batch goes on.
 */
export class NotificationAdapter {
  private entityStore: EntityStore;
  private eventBus: IEventStream;
  private notifier: Notifier;
  private tierResolver: AdminTierResolver;
  private logger: Logger;
  private subscriptions: EventSubscription[] = [];

  constructor(dependencies: NotificationAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.eventBus = dependencies.eventBus;
    this.notifier = dependencies.notifier;
    this.tierResolver = dependencies.tierResolver;
    this.logger = dependencies.logger ?? createLogger('[Notify] ');

    this.subscriptions = [
      this.eventBus.subscribe('report.submitted', async e => { await this.handleReportSubmitted(e); }, 'notification_adapter'),
      this.eventBus.subscribe('report.escalated', async e => { await this.handleReportEscalated(e); }, 'notification_adapter'),
      this.eventBus.subscribe('report.finalized', async e => { await this.handleReportFinalized(e); }, 'notification_adapter'),
      this.eventBus.subscribe('list.closed', async e => { await this.handleListClosed(e); }, 'notification_adapter'),
      this.eventBus.subscribe('act.generated', async e => { await this.handleActGenerated(e); }, 'notification_adapter'),
    ];
  }

  /**
   * Stops listening. Used on shutdown and in tests.
   */
  dispose(): void {
    for (const subscription of this.subscriptions) {
      this.eventBus.unsubscribe(subscription.id);
    }
    this.subscriptions = [];
  }

  /**
   * Regular admins only. Without regular admins the report escalates at
   * once and report.escalated reaches the main admins.
   */
  async handleReportSubmitted(event: ReportSubmittedEvent): Promise<DeliveryOutcome> {
    const { reportId, problemId, submitterUserId, resubmission } = event.payload;
    const ref = await resolveProblemRef(this.entityStore, problemId);
    const report = await this.entityStore.getReport(reportId);
    if (!ref || !report) {
      this.logger.warn(`report ${reportId} disappeared before notification`);
      return { sent: 0, failed: 0 };
    }

    const admins = await this.tierResolver.listAdmins();
    const recipients = admins
      .filter(admin => admin.tier === 'regular')
      .map(admin => ({ channel: 'admin' as const, id: admin.adminId }));

    return this.deliver(recipients, {
      kind: 'report.submitted',
      ...ref,
      reportId,
      submitterUserId,
      caption: report.caption,
      resubmission,
    });
  }

  async handleReportEscalated(event: ReportEscalatedEvent): Promise<DeliveryOutcome> {
    const { reportId, problemId, mainAdminIds } = event.payload;
    const ref = await resolveProblemRef(this.entityStore, problemId);
    if (!ref) {
      return { sent: 0, failed: 0 };
    }

    return this.deliver(
      mainAdminIds.map(id => ({ channel: 'admin' as const, id })),
      { kind: 'report.escalated', ...ref, reportId }
    );
  }

  async handleReportFinalized(event: ReportFinalizedEvent): Promise<DeliveryOutcome> {
    const { reportId, problemId, submitterUserId, status, reason } = event.payload;
    const ref = await resolveProblemRef(this.entityStore, problemId);
    if (!ref) {
      return { sent: 0, failed: 0 };
    }

    const notification: Notification = status === 'accepted'
      ? { kind: 'report.accepted', ...ref, reportId }
      : { kind: 'report.rejected', ...ref, reportId, reason: reason ?? '' };
    return this.deliver([{ channel: 'user', id: submitterUserId }], notification);
  }

  async handleListClosed(event: ListClosedEvent): Promise<DeliveryOutcome> {
    return this.deliver(await this.allAdmins(), {
      kind: 'list.closed',
      listCode: event.payload.code,
      listTitle: event.payload.title,
    });
  }

  async handleActGenerated(event: ActGeneratedEvent): Promise<DeliveryOutcome> {
    const { assigneeId, listCode, problemNumbers, document } = event.payload;
    return this.deliver(await this.allAdmins(), {
      kind: 'act.generated',
      assigneeId,
      listCode,
      problemNumbers,
      document,
    });
  }

  private async allAdmins(): Promise<Recipient[]> {
    const admins = await this.tierResolver.listAdmins();
    return admins.map(admin => ({ channel: 'admin' as const, id: admin.adminId }));
  }

  private async deliver(recipients: Recipient[], notification: Notification): Promise<DeliveryOutcome> {
    const outcome: DeliveryOutcome = { sent: 0, failed: 0 };

    for (const recipient of recipients) {
      try {
        if (recipient.channel === 'admin') {
          await this.notifier.notifyAdmin(recipient.id, notification);
        } else {
          await this.notifier.notifyUser(recipient.id, notification);
        }
        outcome.sent++;
      } catch (error) {
        const failure = new ExternalDeliveryError(recipient.id, error);
        this.logger.warn(`${notification.kind}: ${failure.message}`);
        outcome.failed++;
      }
    }

    return outcome;
  }
}
