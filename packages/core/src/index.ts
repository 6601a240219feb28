/**
 * @fileoverview Main entry point for @tasklist/core
 *
 * Ordered task collection with whole-collection persistence to a
 * key-value engine and pure derived views.
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './settings/index.js';
export * from './storage/index.js';
export * from './tasks/index.js';
export { openTaskList, type OpenTaskListOptions, type TaskListHandle } from './task-list.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'tasklist';
