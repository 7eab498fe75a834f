export { RecordingNotifier } from './recording_notifier';
export type { SentNotification } from './recording_notifier';
