export { FsRecordStore, createFsRecordStores } from './fs_record_store';
export type { FsRecordStoreOptions, Serializer } from './fs_record_store';
