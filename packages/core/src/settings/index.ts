/**
 * @fileoverview Settings Module
 *
 * Defaults, the ~/.tasklist/settings.json file and environment overrides.
 *
 * @example
 * ```typescript
 * const settings = await loadSettings();
 * console.log(settings.storage.backend);
 * ```
 */

export type {
  TaskListSettings,
  StorageSettings,
  StorageBackend,
  LoggingSettings,
  UserSettings,
  DeepPartial,
} from './types.js';

export {
  DEFAULT_SETTINGS,
  DEFAULT_STORAGE_KEY,
  SETTINGS_DIR,
  createDefaultSettings,
  getDataDir,
} from './defaults.js';

export {
  loadSettings,
  loadUserSettings,
  mergeSettings,
  applyEnvOverrides,
  getSettingsPath,
  userSettingsSchema,
  type LoadSettingsOptions,
} from './loader.js';

export {
  parseEnvBoolean,
  parseEnvChoice,
  parseEnvString,
  type EnvParseLogger,
} from './env-parsing.js';
