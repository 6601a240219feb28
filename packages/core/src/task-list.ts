/**
 * @fileoverview Task list composition root
 *
 * Wires settings, the key-value engine, the TaskStore and the controller.
 *
 * @example
 * ```typescript
 * const { controller, close } = await openTaskList();
 * await controller.add('Buy milk');
 * await close();
 * ```
 */

import type { CorruptStorageError } from './errors/index.js';
import { configureLogging, createLogger } from './logging/index.js';
import { loadSettings, type TaskListSettings } from './settings/index.js';
import { createKeyValueStore, type KeyValueStore } from './storage/index.js';
import { TaskListController, TaskStore, type TaskListControllerOptions } from './tasks/index.js';

const logger = createLogger('task-list-app');

export interface OpenTaskListOptions extends TaskListControllerOptions {
  /** Complete settings; loaded from disk and environment when omitted */
  settings?: TaskListSettings;
  /** Engine to use instead of the one the settings select */
  kv?: KeyValueStore;
}

export interface TaskListHandle {
  controller: TaskListController;
  store: TaskStore;
  settings: TaskListSettings;
  /** Close the key-value engine */
  close(): Promise<void>;
}

/**
 * Build a ready task list.
 * @throws PersistenceError if the stored collection could not be read
 */
export async function openTaskList(options: OpenTaskListOptions = {}): Promise<TaskListHandle> {
  const settings = options.settings ?? await loadSettings();
  configureLogging({ level: settings.logging.level, pretty: settings.logging.pretty });

  const kv = options.kv ?? createKeyValueStore(settings.storage);
  const store = new TaskStore(kv, { key: settings.storage.key });
  const controller = new TaskListController(store, {
    generateId: options.generateId,
    now: options.now,
    onWarning: (warning: CorruptStorageError) => options.onWarning?.(warning),
  });

  try {
    await controller.whenReady();
  } catch (error) {
    await kv.close();
    throw error;
  }

  logger.info('Task list opened', {
    backend: options.kv ? 'custom' : settings.storage.backend,
    key: settings.storage.key,
    taskCount: controller.size,
  });

  return {
    controller,
    store,
    settings,
    close: () => kv.close(),
  };
}
