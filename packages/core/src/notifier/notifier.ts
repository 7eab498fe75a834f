/**
 * Notifier port
 *
 * The chat transport lives outside the core. Adapters describe what
 * happened as a structured Notification and the transport decides how to
 * render and deliver it. Delivery is best-effort: implementations throw
 * on failure and callers log and move on.
 */

export type ProblemRef = {
  problemId: string;
  listCode: string;
  listTitle: string;
  problemNumber: number;
  problemTitle: string;
};

export type Notification =
  | (ProblemRef & {
    kind: 'report.submitted';
    reportId: string;
    submitterUserId: string;
    caption: string | null;
    resubmission: boolean;
  })
  | (ProblemRef & {
    kind: 'report.escalated';
    reportId: string;
  })
  | (ProblemRef & {
    kind: 'report.accepted';
    reportId: string;
  })
  | (ProblemRef & {
    kind: 'report.rejected';
    reportId: string;
    reason: string;
  })
  | (ProblemRef & {
    kind: 'reminder';
    dueDate: string;
    daysLeft: number;
  })
  | {
    kind: 'list.closed';
    listCode: string;
    listTitle: string;
  }
  | {
    kind: 'act.generated';
    assigneeId: string;
    listCode: string;
    problemNumbers: number[];
    document: string;
  };

export type NotificationKind = Notification['kind'];

export interface Notifier {
  /**
   * Sends a notification to an executor / submitter.
   */
  notifyUser(userId: string, notification: Notification): Promise<void>;

  /**
   * Sends a notification to an admin.
   */
  notifyAdmin(adminId: string, notification: Notification): Promise<void>;
}

function describeDaysLeft(daysLeft: number): string {
  if (daysLeft === 0) return 'today';
  if (daysLeft === 1) return 'tomorrow';
  return `in ${daysLeft} days`;
}

function problemLabel(ref: ProblemRef): string {
  return `#${ref.problemNumber} from list "${ref.listTitle || ref.listCode}"`;
}

/**
 * Plain-text rendering used by text transports (console, chat).
 */
export function formatNotification(notification: Notification): string {
  switch (notification.kind) {
    case 'report.submitted': {
      const verb = notification.resubmission ? 'Resubmitted' : 'New';
      const lines = [
        `${verb} report ${notification.reportId} on problem ${problemLabel(notification)} by ${notification.submitterUserId}.`,
        `Problem: ${notification.problemTitle}`,
      ];
      if (notification.caption) {
        lines.push(`Comment: ${notification.caption}`);
      }
      return lines.join('\n');
    }
    case 'report.escalated':
      return `Report ${notification.reportId} on problem ${problemLabel(notification)} was approved by every regular admin and awaits a final decision.`;
    case 'report.accepted':
      return `Your report on problem ${problemLabel(notification)} was accepted.`;
    case 'report.rejected':
      return `Your report on problem ${problemLabel(notification)} was rejected.\nReason: ${notification.reason}`;
    case 'reminder':
      return [
        `Reminder: problem ${problemLabel(notification)}.`,
        `Description: ${notification.problemTitle}`,
        `Due: ${notification.dueDate} (${describeDaysLeft(notification.daysLeft)}).`,
      ].join('\n');
    case 'list.closed':
      return `List "${notification.listTitle || notification.listCode}" is closed: every problem has been accepted.`;
    case 'act.generated':
      return `Completion certificate for ${notification.assigneeId} (list ${notification.listCode}, problems ${notification.problemNumbers.join(', ')}): ${notification.document}`;
  }
}
