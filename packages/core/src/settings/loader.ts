/**
 * @fileoverview Settings Loader
 *
 * Loads user settings from ~/.tasklist/settings.json, merges them over the
 * defaults and applies environment overrides.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { createLogger, LOG_LEVELS, type LogLevel } from '../logging/index.js';
import { errorMessage } from '../errors/index.js';
import { createDefaultSettings, SETTINGS_DIR } from './defaults.js';
import { parseEnvBoolean, parseEnvChoice, parseEnvString } from './env-parsing.js';
import type { StorageBackend, TaskListSettings, UserSettings } from './types.js';

const logger = createLogger('settings');

const SETTINGS_FILE = 'settings.json';

const STORAGE_BACKENDS: readonly StorageBackend[] = ['memory', 'file', 'sqlite'];

// =============================================================================
// Schema
// =============================================================================

/**
 * Shape accepted in settings.json. Every field is optional; unknown keys are rejected.
 */
export const userSettingsSchema = z.object({
  storage: z.object({
    backend: z.enum(['memory', 'file', 'sqlite']).optional(),
    key: z.string().min(1, 'storage.key must not be empty').optional(),
    filePath: z.string().min(1).optional(),
    sqlitePath: z.string().min(1).optional(),
  }).strict().optional(),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
    pretty: z.boolean().optional(),
  }).strict().optional(),
}).strict();

// =============================================================================
// Paths
// =============================================================================

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  const home = homeDir ?? os.homedir();
  return path.join(home, SETTINGS_DIR, SETTINGS_FILE);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read and validate the user settings file.
 * Returns null if the file is missing, unreadable or invalid.
 */
export async function loadUserSettings(settingsPath?: string): Promise<UserSettings | null> {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    // ENOENT is expected if the file doesn't exist
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    logger.warn('Failed to read settings, using defaults', { filePath, error: errorMessage(error) });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    logger.warn('Settings file is not valid JSON, using defaults', { filePath, error: errorMessage(error) });
    return null;
  }

  const parsed = userSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Settings file failed validation, using defaults', {
      filePath,
      issues: parsed.error.errors.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

/**
 * Merge user overrides over complete settings
 */
export function mergeSettings(base: TaskListSettings, user: UserSettings | null): TaskListSettings {
  if (!user) {
    return base;
  }
  return {
    storage: { ...base.storage, ...user.storage },
    logging: { ...base.logging, ...user.logging },
  };
}

/**
 * Apply environment variable overrides
 */
export function applyEnvOverrides(
  settings: TaskListSettings,
  env: NodeJS.ProcessEnv = process.env
): TaskListSettings {
  return {
    storage: {
      backend: parseEnvChoice(env.TASKLIST_STORAGE_BACKEND, {
        name: 'TASKLIST_STORAGE_BACKEND',
        choices: STORAGE_BACKENDS,
        fallback: settings.storage.backend,
        logger,
      }),
      key: parseEnvString(env.TASKLIST_STORAGE_KEY, {
        name: 'TASKLIST_STORAGE_KEY',
        fallback: settings.storage.key,
        logger,
      }),
      filePath: parseEnvString(env.TASKLIST_FILE_PATH, {
        name: 'TASKLIST_FILE_PATH',
        fallback: settings.storage.filePath,
        logger,
      }),
      sqlitePath: parseEnvString(env.TASKLIST_DB_PATH, {
        name: 'TASKLIST_DB_PATH',
        fallback: settings.storage.sqlitePath,
        logger,
      }),
    },
    logging: {
      level: parseEnvChoice<LogLevel>(env.LOG_LEVEL, {
        name: 'LOG_LEVEL',
        choices: LOG_LEVELS,
        fallback: settings.logging.level,
        logger,
      }),
      pretty: parseEnvBoolean(env.TASKLIST_LOG_PRETTY, {
        name: 'TASKLIST_LOG_PRETTY',
        fallback: settings.logging.pretty,
        logger,
      }),
    },
  };
}

export interface LoadSettingsOptions {
  /** Settings file to read instead of ~/.tasklist/settings.json */
  settingsPath?: string;
  /** Home directory used for default paths */
  homeDir?: string;
  /** Environment to read overrides from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load complete settings: defaults, then the settings file, then the environment
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<TaskListSettings> {
  const defaults = createDefaultSettings(options.homeDir);
  const user = await loadUserSettings(options.settingsPath ?? getSettingsPath(options.homeDir));
  return applyEnvOverrides(mergeSettings(defaults, user), options.env);
}
