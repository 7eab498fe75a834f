/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { RemedyConfig } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ projectName: 'demo', mainAdminIds: ['1'] });
 * const manager = new ConfigManager(configStore);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: RemedyConfig | null = null;

  async loadConfig(): Promise<RemedyConfig | null> {
    return this.config;
  }

  async saveConfig(config: RemedyConfig): Promise<void> {
    this.config = config;
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup). Accepts null to clear.
   */
  setConfig(config: RemedyConfig | null): void {
    this.config = config;
  }

  getConfig(): RemedyConfig | null {
    return this.config;
  }
}
