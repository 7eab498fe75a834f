/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Handles persistence of config.json to the local filesystem.
 * Also provides static utility methods for project root detection.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { RemedyConfig, ConfigOverrides } from '../../config_manager/config_manager.types';
import { ConfigManager } from '../../config_manager/config_manager';
import { assertRemedyConfig } from '../../validation';
import { isNotFound } from '../../record_store/fs/fs_record_store';

export const REMEDY_DIR = '.remedy';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Stores configuration in .remedy/config.json. A missing file reads as
 * null; a file that is not valid JSON or fails the schema throws.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, REMEDY_DIR, 'config.json');
  }

  async loadConfig(): Promise<RemedyConfig | null> {
    let configContent: string;
    try {
      configContent = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const config: unknown = JSON.parse(configContent);
    assertRemedyConfig(config);
    return config;
  }

  async saveConfig(config: RemedyConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for a .remedy directory.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findRemedyRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    while (currentPath !== path.parse(currentPath).root) {
      if (existsSync(path.join(currentPath, REMEDY_DIR))) {
        return currentPath;
      }
      currentPath = path.dirname(currentPath);
    }

    // Final check at the root directory
    if (existsSync(path.join(currentPath, REMEDY_DIR))) {
      return currentPath;
    }

    return null;
  }

  /**
   * Gets the .remedy directory path from project root
   *
   * @throws Error outside a Remedy project
   */
  static getRemedyPath(startPath: string = process.cwd()): string {
    const root = FsConfigStore.findRemedyRoot(startPath);
    if (!root) {
      throw new Error('Could not find project root. Run "remedy init" first.');
    }
    return path.join(root, REMEDY_DIR);
  }
}

/**
 * Creates a ConfigManager backed by `<projectRoot>/.remedy/config.json`.
 */
export function createConfigManager(projectRoot: string, overrides: ConfigOverrides = {}): ConfigManager {
  return new ConfigManager(new FsConfigStore(projectRoot), overrides);
}
