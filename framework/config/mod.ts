/**
 * Configuration
 */

export {
  Config,
  DEFAULT_SERVER_SETTINGS,
  configFromEnv,
  loadConfig,
  type ConfigOptions,
  type ServerSettings,
} from './config.ts';
