/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `know config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  BackendKindSchema,
  IngestConfigSchema,
  RagConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, BackendKind } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  deepMerge,
  getConfigValue,
  setConfigValue,
  listConfig,
  type LoadConfigOptions,
} from './loader.js';

export { getKnowDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasOpenAIKey,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';

// Effective settings
export { resolveSettings } from './settings.js';
export type {
  Settings,
  SettingsOverrides,
  BackendSettings,
  ServiceSettings,
  IngestSettings,
  RagSettings,
  HttpSettings,
  EmptyContextPolicy,
} from './settings.js';
