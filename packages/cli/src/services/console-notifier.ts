import { Notifier } from '@remedy/core';

export type LineWriter = (line: string) => void;

const writeToStderr: LineWriter = line => {
  process.stderr.write(`${line}\n`);
};

/**
 * Stand-in for the chat transport: prints each message with its recipient.
 * Writes to stderr so --json output on stdout stays parseable.
 */
export class ConsoleNotifier implements Notifier.Notifier {
  constructor(private readonly write: LineWriter = writeToStderr) {}

  async notifyUser(userId: string, notification: Notifier.Notification): Promise<void> {
    this.print(`📨 user ${userId}`, notification);
  }

  async notifyAdmin(adminId: string, notification: Notifier.Notification): Promise<void> {
    this.print(`📨 admin ${adminId}`, notification);
  }

  private print(header: string, notification: Notifier.Notification): void {
    const body = Notifier.formatNotification(notification)
      .split('\n')
      .map(line => `   ${line}`);
    this.write([`${header} [${notification.kind}]`, ...body].join('\n'));
  }
}
