// Core interfaces - backend-agnostic
export type { RecordStore } from './record_store';
export * from './record_store.types';

// NOTE: Implementations are exported via subpaths:
// - @remedy/core/fs -> FsRecordStore, createFsRecordStores
// - @remedy/core/memory -> MemoryRecordStore, createMemoryRecordStores
