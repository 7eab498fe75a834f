export { FsConfigStore, REMEDY_DIR, createConfigManager } from './fs_config_store';
