export { ReminderAdapter, DEFAULT_REMINDER_WINDOW_DAYS } from './reminder_adapter';
export type { ReminderAdapterDependencies, DueReminder } from './reminder_adapter';
