/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to the Remedy project configuration (config.json).
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store/config_store';
import { assertRemedyConfig } from '../validation';
import {
  CONFIG_DEFAULTS,
} from './config_manager.types';
import type {
  IConfigManager,
  RemedyConfig,
  ResolvedRemedyConfig,
  ConfigOverrides,
} from './config_manager.types';

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@remedy/core/fs';
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 *
 * // Test usage
 * import { MemoryConfigStore } from '@remedy/core/memory';
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ projectName: 'demo' });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly overrides: ConfigOverrides;

  constructor(configStore: ConfigStore, overrides: ConfigOverrides = {}) {
    this.configStore = configStore;
    this.overrides = overrides;
  }

  /**
   * Load configuration as stored. Null when the project is not initialized.
   */
  async loadConfig(): Promise<RemedyConfig | null> {
    return this.configStore.loadConfig();
  }

  /**
   * Load configuration with defaults and overrides applied.
   * Overrides win over config.json.
   */
  async resolveConfig(): Promise<ResolvedRemedyConfig> {
    const config = await this.loadConfig();
    if (!config) {
      throw new Error('Cannot resolve config: config.json not found. Run "remedy init" first.');
    }

    return {
      projectName: config.projectName,
      bootstrapAdminIds: this.overrides.bootstrapAdminIds ?? config.bootstrapAdminIds ?? [],
      mainAdminIds: this.overrides.mainAdminIds ?? config.mainAdminIds ?? [],
      reminders: {
        windowDays: config.reminders?.windowDays ?? CONFIG_DEFAULTS.reminderWindowDays,
        intervalHours: config.reminders?.intervalHours ?? CONFIG_DEFAULTS.reminderIntervalHours,
      },
      acts: {
        intervalHours: config.acts?.intervalHours ?? CONFIG_DEFAULTS.actIntervalHours,
      },
    };
  }

  async saveConfig(config: RemedyConfig): Promise<void> {
    assertRemedyConfig(config);
    await this.configStore.saveConfig(config);
  }

  async getMainAdminIds(): Promise<string[]> {
    const resolved = await this.resolveConfig();
    return resolved.mainAdminIds;
  }

  /**
   * Adds or removes an admin from the main tier in config.json.
   * Has no visible effect while REMEDY_MAIN_ADMIN_IDS overrides the file.
   */
  async setMainAdmin(adminId: string, isMain: boolean): Promise<void> {
    const config = await this.loadConfig();
    if (!config) {
      throw new Error('Cannot update main admins: config.json not found');
    }

    const current = new Set(config.mainAdminIds ?? []);
    if (isMain) {
      current.add(adminId);
    } else {
      current.delete(adminId);
    }

    await this.saveConfig({ ...config, mainAdminIds: Array.from(current).sort() });
  }
}
