/**
 * @fileoverview Default Settings
 *
 * Fallback values used when user settings and the environment are silent.
 */

import * as os from 'os';
import * as path from 'path';
import type { TaskListSettings } from './types.js';

/** Directory under the home directory that holds settings and data */
export const SETTINGS_DIR = '.tasklist';

/** Key the collection is stored under */
export const DEFAULT_STORAGE_KEY = 'TODOS';

export function getDataDir(homeDir: string = os.homedir()): string {
  return path.join(homeDir, SETTINGS_DIR);
}

/**
 * Build the complete default settings for a home directory
 */
export function createDefaultSettings(homeDir?: string): TaskListSettings {
  const dataDir = getDataDir(homeDir);
  return {
    storage: {
      backend: 'sqlite',
      key: DEFAULT_STORAGE_KEY,
      filePath: path.join(dataDir, 'tasks.json'),
      sqlitePath: path.join(dataDir, 'tasks.db'),
    },
    logging: {
      level: 'warn',
      pretty: false,
    },
  };
}

export const DEFAULT_SETTINGS: TaskListSettings = createDefaultSettings();
