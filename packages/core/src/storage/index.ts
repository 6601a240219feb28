/**
 * @fileoverview Key-value engines
 */

import * as fs from 'fs';
import * as path from 'path';
import type { StorageSettings } from '../settings/index.js';
import { FileKeyValueStore } from './file-kv-store.js';
import { MemoryKeyValueStore } from './memory-kv-store.js';
import { SqliteKeyValueStore } from './sqlite-kv-store.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryKeyValueStore } from './memory-kv-store.js';
export { FileKeyValueStore } from './file-kv-store.js';
export { SqliteKeyValueStore, type SqliteKeyValueStoreConfig } from './sqlite-kv-store.js';

/**
 * Create the engine selected by the storage settings
 */
export function createKeyValueStore(settings: StorageSettings): KeyValueStore {
  switch (settings.backend) {
    case 'memory':
      return new MemoryKeyValueStore();
    case 'file':
      return new FileKeyValueStore(settings.filePath);
    case 'sqlite':
      if (settings.sqlitePath !== ':memory:') {
        fs.mkdirSync(path.dirname(settings.sqlitePath), { recursive: true });
      }
      return new SqliteKeyValueStore({ dbPath: settings.sqlitePath });
  }
}
