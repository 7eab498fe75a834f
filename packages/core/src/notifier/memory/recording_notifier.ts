import type { Notification, Notifier } from '../notifier';

export type SentNotification = {
  channel: 'user' | 'admin';
  recipientId: string;
  notification: Notification;
};

/**
 * Notifier that records every send instead of delivering it.
 * Recipients registered with failFor() throw, to exercise delivery failures.
 */
export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];
  private readonly failing = new Set<string>();

  async notifyUser(userId: string, notification: Notification): Promise<void> {
    this.deliver('user', userId, notification);
  }

  async notifyAdmin(adminId: string, notification: Notification): Promise<void> {
    this.deliver('admin', adminId, notification);
  }

  failFor(recipientId: string): void {
    this.failing.add(recipientId);
  }

  /** Notifications of one kind, in send order */
  ofKind<K extends Notification['kind']>(kind: K): SentNotification[] {
    return this.sent.filter(entry => entry.notification.kind === kind);
  }

  clear(): void {
    this.sent.length = 0;
    this.failing.clear();
  }

  private deliver(channel: 'user' | 'admin', recipientId: string, notification: Notification): void {
    if (this.failing.has(recipientId)) {
      throw new Error(`chat unavailable for ${recipientId}`);
    }
    this.sent.push({ channel, recipientId, notification });
  }
}
