export { formatNotification } from './notifier';
export type { Notifier, Notification, NotificationKind, ProblemRef } from './notifier';
