/**
 * ConfigStore Interface
 *
 * Abstraction for config.json persistence (filesystem, or memory for tests).
 */

import type { RemedyConfig } from '../config_manager/config_manager.types';

/**
 * Implementations:
 * - FsConfigStore: Filesystem-based (.remedy/config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * @returns RemedyConfig or null if the project has no config yet
   */
  loadConfig(): Promise<RemedyConfig | null>;

  saveConfig(config: RemedyConfig): Promise<void>;
}
