import type { EntityStore } from '../../entity_store';
import type { Notifier } from '../../notifier';
import type { Logger } from '../../logger';
import type { DeliveryOutcome } from '../notification_adapter';

import { resolveProblemRef } from '../notification_adapter';
import { DetailedValidationError, ExternalDeliveryError } from '../../errors';
import { createLogger } from '../../logger';
import { formatCalendarDate, parseCalendarDate } from '../../utils/date_utils';

export const DEFAULT_REMINDER_WINDOW_DAYS = 3;

export type DueReminder = {
  problemId: string;
  assigneeId: string;
  dueDate: string;
  daysLeft: number;
};

/**
 * ReminderAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface ReminderAdapterDependencies {
  entityStore: EntityStore;
  notifier: Notifier;
  /** Largest number of days ahead that still triggers a reminder */
  windowDays?: number;
  logger?: Logger;
}

function toDayNumber(today: string | Date): number {
  const value = typeof today === 'string' ? today : formatCalendarDate(today);
  const day = parseCalendarDate(value);
  if (day === null) {
    throw new DetailedValidationError('ReminderSweep', [
      { field: 'today', message: 'must be a YYYY-MM-DD calendar date', value },
    ]);
  }
  return day;
}

/**
 * ReminderAdapter - deadline reminders for open work.
 */
export class ReminderAdapter {
  private entityStore: EntityStore;
  private notifier: Notifier;
  private windowDays: number;
  private logger: Logger;

  constructor(dependencies: ReminderAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.notifier = dependencies.notifier;
    this.windowDays = dependencies.windowDays ?? DEFAULT_REMINDER_WINDOW_DAYS;
    this.logger = dependencies.logger ?? createLogger('[Reminders] ');
  }

  /**
   * One record per assignee of every in-progress or reported problem in an
   * open list whose due date falls within the window. Malformed dates are
   * skipped. Reads only.
   */
  async dueReminders(today: string | Date): Promise<DueReminder[]> {
    const todayDay = toDayNumber(today);
    const openLists = await this.entityStore.listLists({ onlyOpen: true });
    const openListIds = new Set(openLists.map(list => list.id));
    const problems = await this.entityStore.findProblems({ statuses: ['in_progress', 'report_sent'] });

    const reminders: DueReminder[] = [];
    for (const problem of problems) {
      if (!openListIds.has(problem.listId) || problem.dueDate === null) continue;

      const dueDay = parseCalendarDate(problem.dueDate);
      if (dueDay === null) continue;

      const daysLeft = dueDay - todayDay;
      if (daysLeft < 0 || daysLeft > this.windowDays) continue;

      for (const assigneeId of problem.assignees) {
        reminders.push({ problemId: problem.id, assigneeId, dueDate: problem.dueDate, daysLeft });
      }
    }
    return reminders;
  }

  /**
   * Derives today's reminders and sends each one. A failed send is logged
   * and does not stop the rest.
   */
  async sendDueReminders(today: string | Date): Promise<DeliveryOutcome> {
    const reminders = await this.dueReminders(today);
    const outcome: DeliveryOutcome = { sent: 0, failed: 0 };

    for (const reminder of reminders) {
      const ref = await resolveProblemRef(this.entityStore, reminder.problemId);
      if (!ref) continue;

      try {
        await this.notifier.notifyUser(reminder.assigneeId, {
          kind: 'reminder',
          ...ref,
          dueDate: reminder.dueDate,
          daysLeft: reminder.daysLeft,
        });
        outcome.sent++;
      } catch (error) {
        const failure = new ExternalDeliveryError(reminder.assigneeId, error);
        this.logger.warn(`reminder: ${failure.message}`);
        outcome.failed++;
      }
    }

    this.logger.info(`reminders: ${outcome.sent} sent, ${outcome.failed} failed`);
    return outcome;
  }
}
