/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. For implementations, use:
 * - @remedy/core/fs for FsConfigStore
 * - @remedy/core/memory for MemoryConfigStore
 */
export type { ConfigStore } from './config_store';
