export { ConfigManager } from './config_manager';
export { CONFIG_DEFAULTS } from './config_manager.types';
export type {
  IConfigManager,
  RemedyConfig,
  ResolvedRemedyConfig,
  ConfigOverrides,
} from './config_manager.types';
