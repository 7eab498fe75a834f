import * as path from 'path';
import { createRemedy, Logger } from '@remedy/core';
import type { Config, Remedy } from '@remedy/core';
import {
  createConfigManager,
  createFsRecordStores,
  FsConfigStore,
  JsonDocumentRenderer,
  REMEDY_DIR,
} from '@remedy/core/fs';
import { ConsoleNotifier } from './console-notifier';

/**
 * Settings taken from the process environment (and .env via dotenv).
 */
export type CliEnvironment = {
  /** Project root; skips the upward search for .remedy/ */
  home?: string;
  bootstrapAdminIds?: string[];
  mainAdminIds?: string[];
  logLevel?: Logger.LogLevel;
};

/**
 * Splits a comma-separated id list. Blank means "not set".
 */
export function parseIdList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.split(',').map(id => id.trim()).filter(id => id.length > 0);
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): CliEnvironment {
  const logLevel = env['LOG_LEVEL'];
  return {
    home: env['REMEDY_HOME'] || undefined,
    bootstrapAdminIds: parseIdList(env['REMEDY_BOOTSTRAP_ADMIN_IDS']),
    mainAdminIds: parseIdList(env['REMEDY_MAIN_ADMIN_IDS']),
    logLevel: Logger.isLogLevel(logLevel) ? logLevel : undefined,
  };
}

/**
 * Dependency Injection Service for the Remedy CLI
 *
 * Creates and manages the core instance over the filesystem stores in
 * `<project>/.remedy/`, following the wiring of createRemedy.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private remedy: Remedy | null = null;
  private configManager: Config.ConfigManager | null = null;
  private projectRoot: string | null = null;
  private logLevel: Logger.LogLevel | undefined;
  private readonly environment: CliEnvironment;

  private constructor(environment: CliEnvironment) {
    this.environment = environment;
  }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService(readEnvironment());
    }
    return DependencyInjectionService.instance;
  }

  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Level for every logger created afterwards (--verbose, --quiet).
   */
  setLogLevel(level: Logger.LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Where `remedy init` creates a project: REMEDY_HOME or the working directory.
   */
  getInitRoot(): string {
    return path.resolve(this.environment.home ?? process.cwd());
  }

  getProjectRoot(): string {
    if (this.projectRoot) {
      return this.projectRoot;
    }

    const root = this.environment.home
      ? path.resolve(this.environment.home)
      : FsConfigStore.findRemedyRoot();
    if (!root) {
      throw new Error("Remedy not initialized. Run 'remedy init' first.");
    }

    this.projectRoot = root;
    return root;
  }

  /**
   * ConfigManager for the project, with environment overrides applied.
   */
  getConfigManager(projectRoot: string = this.getProjectRoot()): Config.ConfigManager {
    if (this.configManager && projectRoot === this.projectRoot) {
      return this.configManager;
    }

    const configManager = createConfigManager(projectRoot, {
      bootstrapAdminIds: this.environment.bootstrapAdminIds,
      mainAdminIds: this.environment.mainAdminIds,
    });
    this.projectRoot = projectRoot;
    this.configManager = configManager;
    return configManager;
  }

  /**
   * Creates and returns the core with all required dependencies.
   * Bootstrap admins from config are ensured on first use.
   */
  async getRemedy(): Promise<Remedy> {
    if (this.remedy) {
      return this.remedy;
    }

    const projectRoot = this.getProjectRoot();
    const configManager = this.getConfigManager(projectRoot);
    const config = await configManager.resolveConfig();
    const storageRoot = path.join(projectRoot, REMEDY_DIR);

    const remedy = createRemedy({
      stores: createFsRecordStores(storageRoot),
      notifier: new ConsoleNotifier(),
      renderer: new JsonDocumentRenderer(path.join(storageRoot, 'certificates')),
      mainAdminIds: () => configManager.getMainAdminIds(),
      reminderWindowDays: config.reminders.windowDays,
      logLevel: this.logLevel ?? this.environment.logLevel,
    });
    await remedy.identity.ensureBootstrapAdmins(config.bootstrapAdminIds);

    this.remedy = remedy;
    return remedy;
  }

  /**
   * Waits for pending notifications and releases the core.
   */
  async dispose(): Promise<void> {
    if (this.remedy) {
      await this.remedy.dispose();
      this.remedy = null;
    }
  }
}
