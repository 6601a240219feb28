/**
 * @fileoverview Task List Controller
 *
 * Owns the authoritative, ordered task collection. Every command validates,
 * swaps in the new collection, persists it through the TaskStore and only
 * then publishes it to subscribers.
 */

import {
  CorruptStorageError,
  DuplicateTaskIdError,
  IndexOutOfRangeError,
  NotFoundError,
  PersistenceError,
  errorMessage,
  isTaskListError,
} from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { TaskStore } from './task-store.js';
import { createTaskRecord, generateTaskId, normalizeTitle, withChanges } from './task-record.js';
import { derive } from './view-composer.js';
import type {
  FilterMode,
  TaskChanges,
  TaskListListener,
  TaskListSubscription,
  TaskRecord,
} from './types.js';

const logger = createLogger('task-list');

export type ControllerState = 'uninitialized' | 'ready';

export interface TaskListControllerOptions {
  /** Id source for new tasks (default: "task_" + random UUID) */
  generateId?: () => string;
  /** Clock used for createdAt */
  now?: () => Date;
  /** Called once if the stored collection was corrupt and an empty list was used instead */
  onWarning?: (warning: CorruptStorageError) => void;
}

export interface SubscribeOptions {
  /** Deliver the current collection immediately if the controller is ready */
  emitCurrent?: boolean;
}

/**
 * TaskListController is the sole mutator of the collection.
 *
 * Design notes:
 * - The stored collection is loaded exactly once, at construction
 * - Commands issued before the load finishes wait for it
 * - Commands run one at a time through a promise chain, so a
 *   read-modify-save-notify sequence never interleaves with another
 * - A failed save restores the pre-command collection before rethrowing
 */
export class TaskListController {
  private readonly store: TaskStore;
  private readonly generateId: () => string;
  private readonly now: () => Date;
  private readonly onWarning?: (warning: CorruptStorageError) => void;

  private tasks: readonly TaskRecord[] = Object.freeze([]);
  private currentState: ControllerState = 'uninitialized';
  private initError: PersistenceError | null = null;
  private warning: CorruptStorageError | null = null;
  private readonly ready: Promise<void>;
  private commandQueue: Promise<void> = Promise.resolve();
  private readonly listeners = new Set<TaskListListener>();

  constructor(store: TaskStore, options: TaskListControllerOptions = {}) {
    this.store = store;
    this.generateId = options.generateId ?? generateTaskId;
    this.now = options.now ?? (() => new Date());
    this.onWarning = options.onWarning;
    this.ready = this.initialize();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  private async initialize(): Promise<void> {
    const done = logger.startTimer('Initial load');
    try {
      this.tasks = Object.freeze(await this.store.load());
    } catch (error) {
      if (!(error instanceof CorruptStorageError)) {
        this.initError = error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to load tasks: ${errorMessage(error)}`, 'load', { cause: error });
        logger.error('Failed to load tasks', this.initError);
        return;
      }
      this.warning = error;
      this.tasks = Object.freeze([]);
      logger.warn('Stored tasks are corrupt, starting with an empty list', {
        key: error.key,
        error: error.message,
      });
      this.reportWarning(error);
    }

    done();
    this.currentState = 'ready';
    logger.info('Task list ready', { taskCount: this.tasks.length });
    this.notify();
  }

  private reportWarning(warning: CorruptStorageError): void {
    if (!this.onWarning) return;
    try {
      this.onWarning(warning);
    } catch (error) {
      logger.error('Error in warning callback', { error: errorMessage(error) });
    }
  }

  /**
   * Resolves once the initial load finished.
   * @throws PersistenceError if the engine could not be read
   */
  async whenReady(): Promise<void> {
    await this.ready;
    if (this.initError) {
      throw this.initError;
    }
  }

  get state(): ControllerState {
    return this.currentState;
  }

  /**
   * The corruption that was recovered from at load time, if any
   */
  get loadWarning(): CorruptStorageError | null {
    return this.warning;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  currentCollection(): readonly TaskRecord[] {
    return this.tasks;
  }

  getTask(id: string): TaskRecord | undefined {
    return this.tasks.find((task) => task.id === id);
  }

  get size(): number {
    return this.tasks.length;
  }

  derive(filterMode: FilterMode, query: string): TaskRecord[] {
    return derive(this.tasks, filterMode, query);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Create a task at the front of the list (newest first)
   * @throws ValidationError if the title is blank
   */
  async add(title: string, description?: string | null): Promise<TaskRecord> {
    return this.enqueue('add', async () => {
      const normalizedTitle = normalizeTitle(title);
      const record = createTaskRecord({
        id: this.generateId(),
        title: normalizedTitle,
        description,
        createdAt: this.now(),
      });
      if (this.tasks.some((task) => task.id === record.id)) {
        throw new DuplicateTaskIdError(record.id);
      }

      await this.commit('add', [record, ...this.tasks]);
      return record;
    });
  }

  /**
   * Replace a task in place with the given overrides applied
   * @throws NotFoundError if no task has this id
   * @throws ValidationError if the resulting title is blank
   */
  async edit(id: string, changes: TaskChanges): Promise<TaskRecord> {
    return this.enqueue('edit', () => this.replace('edit', id, (current) => withChanges(current, changes)));
  }

  /**
   * Remove a task. Removing an unknown id succeeds without saving.
   * @returns whether a task was removed
   */
  async remove(id: string): Promise<boolean> {
    return this.enqueue('remove', async () => {
      const next = this.tasks.filter((task) => task.id !== id);
      if (next.length === this.tasks.length) {
        logger.child({ taskId: id }).debug('Remove ignored, task not present');
        return false;
      }

      await this.commit('remove', next);
      return true;
    });
  }

  /**
   * Flip a task's completed flag
   * @throws NotFoundError if no task has this id
   */
  async toggleCompleted(id: string): Promise<TaskRecord> {
    return this.enqueue('toggleCompleted', () =>
      this.replace('toggleCompleted', id, (current) => withChanges(current, { completed: !current.completed }))
    );
  }

  /**
   * Move the task at `fromIndex` to `toIndex`. `toIndex` counts positions
   * after the task has been taken out of the list.
   * @throws IndexOutOfRangeError if either index is outside [0, length)
   */
  async reorder(fromIndex: number, toIndex: number): Promise<void> {
    return this.enqueue('reorder', async () => {
      this.assertIndex(fromIndex);
      this.assertIndex(toIndex);
      if (fromIndex === toIndex) return;

      const next = [...this.tasks];
      const [moved] = next.splice(fromIndex, 1);
      if (!moved) {
        throw new IndexOutOfRangeError(fromIndex, this.tasks.length);
      }
      next.splice(toIndex, 0, moved);

      await this.commit('reorder', next);
    });
  }

  /**
   * Remove every completed task in a single save
   * @returns how many tasks were removed
   */
  async clearCompleted(): Promise<number> {
    return this.enqueue('clearCompleted', async () => {
      const next = this.tasks.filter((task) => !task.completed);
      const removed = this.tasks.length - next.length;
      if (removed === 0) return 0;

      await this.commit('clearCompleted', next);
      return removed;
    });
  }

  // ===========================================================================
  // Observation
  // ===========================================================================

  /**
   * Register a listener called synchronously after every successful mutation
   */
  subscribe(listener: TaskListListener, options: SubscribeOptions = {}): TaskListSubscription {
    this.listeners.add(listener);
    if (options.emitCurrent && this.currentState === 'ready') {
      this.deliver(listener, this.tasks);
    }
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Run a command after every earlier command and the initial load settled.
   */
  private async enqueue<T>(command: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.commandQueue;
    let release: (() => void) | undefined;
    this.commandQueue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      await this.whenReady();
      return await fn();
    } catch (error) {
      if (isTaskListError(error)) {
        logger.debug('Command rejected', { command, code: error.code, error: error.message });
      } else {
        logger.error('Command failed', { command, error: errorMessage(error) });
      }
      throw error;
    } finally {
      release?.();
    }
  }

  private async replace(
    command: string,
    id: string,
    update: (current: TaskRecord) => TaskRecord
  ): Promise<TaskRecord> {
    const index = this.tasks.findIndex((task) => task.id === id);
    const current = this.tasks[index];
    if (index === -1 || !current) {
      throw new NotFoundError(id);
    }

    const updated = update(current);
    const next = [...this.tasks];
    next[index] = updated;

    await this.commit(command, next);
    logger.child({ taskId: id }).debug('Task replaced', { command });
    return updated;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.tasks.length) {
      throw new IndexOutOfRangeError(index, this.tasks.length);
    }
  }

  /**
   * Swap in the new collection, persist it, then publish it.
   * On save failure the previous collection is restored and republished.
   */
  private async commit(command: string, next: TaskRecord[]): Promise<void> {
    const previous = this.tasks;
    this.tasks = Object.freeze(next);

    try {
      await this.store.save(this.tasks);
    } catch (error) {
      this.tasks = previous;
      logger.error('Save failed, collection rolled back', {
        command,
        error: errorMessage(error),
      });
      // Observers may have read the pending collection while the save was in flight
      this.notify();
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to save tasks: ${errorMessage(error)}`, 'save', { cause: error });
    }

    logger.debug('Command committed', { command, taskCount: this.tasks.length });
    this.notify();
  }

  private notify(): void {
    const snapshot = this.tasks;
    for (const listener of [...this.listeners]) {
      this.deliver(listener, snapshot);
    }
  }

  private deliver(listener: TaskListListener, snapshot: readonly TaskRecord[]): void {
    try {
      const result: unknown = listener(snapshot);
      if (result instanceof Promise) {
        void result.catch((error: unknown) => {
          logger.error('Error in async task list listener', { error: errorMessage(error) });
        });
      }
    } catch (error) {
      logger.error('Error in task list listener', { error: errorMessage(error) });
    }
  }
}
