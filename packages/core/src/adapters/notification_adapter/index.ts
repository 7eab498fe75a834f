export { NotificationAdapter, resolveProblemRef } from './notification_adapter';
export type { NotificationAdapterDependencies, DeliveryOutcome } from './notification_adapter';
