/**
 * @fileoverview Task list types
 *
 * Core types for the task record, its edits and the derived views.
 */

// =============================================================================
// TaskRecord
// =============================================================================

/**
 * A single task in the list.
 * Immutable - edits produce a new record with the same id and createdAt.
 */
export interface TaskRecord {
  /** Unique within a collection (e.g. "task_8f0c...") */
  readonly id: string;

  /** Trimmed, never blank */
  readonly title: string;

  /** Trimmed; absent rather than empty */
  readonly description?: string;

  readonly completed: boolean;

  /** Set once at creation */
  readonly createdAt: Date;
}

/**
 * Input for building a new record
 */
export interface NewTaskRecord {
  id: string;
  title: string;
  description?: string | null;
  completed?: boolean;
  createdAt?: Date;
}

/**
 * Overrides accepted by an edit. Omitted fields keep their value;
 * `description: null` (or a blank string) clears the description.
 */
export interface TaskChanges {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

// =============================================================================
// Derived views
// =============================================================================

export type FilterMode = 'all' | 'active' | 'completed';

export const FILTER_MODES: readonly FilterMode[] = ['all', 'active', 'completed'];

export interface TaskSummary {
  total: number;
  active: number;
  completed: number;
}

// =============================================================================
// Observation
// =============================================================================

/**
 * Called with each published collection. A returned promise that rejects is logged.
 */
export type TaskListListener = (tasks: readonly TaskRecord[]) => void | Promise<void>;

export interface TaskListSubscription {
  unsubscribe(): void;
}
