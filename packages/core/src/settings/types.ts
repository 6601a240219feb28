/**
 * @fileoverview Settings types
 */

import type { LogLevel } from '../logging/index.js';

export type StorageBackend = 'memory' | 'file' | 'sqlite';

export interface StorageSettings {
  /** Which key-value engine holds the collection */
  backend: StorageBackend;
  /** Key the whole collection is written under */
  key: string;
  /** JSON file used by the file backend */
  filePath: string;
  /** Database used by the sqlite backend (':memory:' allowed) */
  sqlitePath: string;
}

export interface LoggingSettings {
  level: LogLevel;
  pretty: boolean;
}

export interface TaskListSettings {
  storage: StorageSettings;
  logging: LoggingSettings;
}

/**
 * Deep partial type for user overrides
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type UserSettings = DeepPartial<TaskListSettings>;
