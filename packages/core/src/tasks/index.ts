/**
 * @fileoverview Task Module Exports
 */

// Types
export * from './types.js';

// Records
export {
  createTaskRecord,
  withChanges,
  normalizeTitle,
  normalizeDescription,
  generateTaskId,
} from './task-record.js';

// Persistence
export { TaskStore, encodeTaskRecord, decodeTaskRecord, type TaskStoreOptions } from './task-store.js';
export { storedTaskSchema, type StoredTask } from './schemas.js';

// Controller
export {
  TaskListController,
  type ControllerState,
  type TaskListControllerOptions,
  type SubscribeOptions,
} from './task-list-controller.js';

// Views
export { derive, summarize, formatSummary } from './view-composer.js';
export { TaskListView, type TaskListViewOptions } from './task-list-view.js';
