/**
 * Filesystem-dependent implementations
 *
 * Use @remedy/core/memory for in-memory alternatives.
 */

// Store
export { FsRecordStore, createFsRecordStores } from './record_store/fs';
export type { FsRecordStoreOptions, Serializer } from './record_store/fs';

// ConfigStore + ConfigManager factory
export { FsConfigStore, REMEDY_DIR, createConfigManager } from './config_store/fs';

// DocumentRenderer
export { JsonDocumentRenderer } from './document_renderer/fs';
