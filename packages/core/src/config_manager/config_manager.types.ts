/**
 * ConfigManager Types
 */

/**
 * Project configuration as stored in .remedy/config.json
 */
export type RemedyConfig = {
  projectName: string;
  createdAt?: string;
  /** Users promoted to admin on startup */
  bootstrapAdminIds?: string[];
  /** Admins classified as main tier; every other admin is regular tier */
  mainAdminIds?: string[];
  reminders?: {
    windowDays?: number;
    intervalHours?: number;
  };
  acts?: {
    intervalHours?: number;
  };
};

/**
 * Configuration with defaults and overrides applied
 */
export type ResolvedRemedyConfig = {
  projectName: string;
  bootstrapAdminIds: string[];
  mainAdminIds: string[];
  reminders: {
    windowDays: number;
    intervalHours: number;
  };
  acts: {
    intervalHours: number;
  };
};

/**
 * Values that take precedence over config.json (environment, CLI flags)
 */
export type ConfigOverrides = {
  bootstrapAdminIds?: string[];
  mainAdminIds?: string[];
};

export const CONFIG_DEFAULTS = {
  reminderWindowDays: 3,
  reminderIntervalHours: 24,
  actIntervalHours: 24 * 14,
} as const;

/**
 * Public interface for configuration access
 */
export interface IConfigManager {
  loadConfig(): Promise<RemedyConfig | null>;
  resolveConfig(): Promise<ResolvedRemedyConfig>;
  saveConfig(config: RemedyConfig): Promise<void>;
  getMainAdminIds(): Promise<string[]>;
  setMainAdmin(adminId: string, isMain: boolean): Promise<void>;
}
