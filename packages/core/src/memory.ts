/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the core without persistence.
 */

// Store
export { MemoryRecordStore, createMemoryRecordStores } from './record_store/memory';
export type { MemoryRecordStoreOptions } from './record_store/memory';

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// Notifier
export { RecordingNotifier } from './notifier/memory';
export type { SentNotification } from './notifier/memory';

// DocumentRenderer
export { MemoryDocumentRenderer } from './document_renderer/memory';
