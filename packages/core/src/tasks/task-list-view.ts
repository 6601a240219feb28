/**
 * @fileoverview Task List View
 *
 * Holds the presentation's filter mode and search query and keeps the
 * derived sequence current as the collection, filter or query change.
 */

import { createLogger } from '../logging/index.js';
import { errorMessage } from '../errors/index.js';
import type { TaskListController } from './task-list-controller.js';
import { derive, summarize } from './view-composer.js';
import type {
  FilterMode,
  TaskListListener,
  TaskListSubscription,
  TaskRecord,
  TaskSummary,
} from './types.js';

const logger = createLogger('task-list-view');

export interface TaskListViewOptions {
  filterMode?: FilterMode;
  query?: string;
}

export class TaskListView {
  private filterMode: FilterMode;
  private query: string;
  private source: readonly TaskRecord[];
  private visible: readonly TaskRecord[];
  private readonly listeners = new Set<TaskListListener>();
  private readonly subscription: TaskListSubscription;

  constructor(controller: TaskListController, options: TaskListViewOptions = {}) {
    this.filterMode = options.filterMode ?? 'all';
    this.query = options.query ?? '';
    this.source = controller.currentCollection();
    this.visible = derive(this.source, this.filterMode, this.query);
    this.subscription = controller.subscribe((tasks) => {
      this.source = tasks;
      this.recompute();
    });
  }

  get filter(): FilterMode {
    return this.filterMode;
  }

  get searchQuery(): string {
    return this.query;
  }

  /**
   * The tasks to display, in collection order
   */
  current(): readonly TaskRecord[] {
    return this.visible;
  }

  /**
   * Counts over the whole collection, ignoring filter and query
   */
  summary(): TaskSummary {
    return summarize(this.source);
  }

  setFilter(filterMode: FilterMode): void {
    if (filterMode === this.filterMode) return;
    this.filterMode = filterMode;
    this.recompute();
  }

  setQuery(query: string): void {
    if (query === this.query) return;
    this.query = query;
    this.recompute();
  }

  subscribe(listener: TaskListListener): TaskListSubscription {
    this.listeners.add(listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  /**
   * Stop following the controller and drop all listeners
   */
  dispose(): void {
    this.subscription.unsubscribe();
    this.listeners.clear();
  }

  private recompute(): void {
    this.visible = Object.freeze(derive(this.source, this.filterMode, this.query));
    for (const listener of [...this.listeners]) {
      try {
        const result: unknown = listener(this.visible);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            logger.error('Error in async view listener', { error: errorMessage(error) });
          });
        }
      } catch (error) {
        logger.error('Error in view listener', { error: errorMessage(error) });
      }
    }
  }
}
