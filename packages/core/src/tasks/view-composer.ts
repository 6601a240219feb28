/**
 * @fileoverview View composition
 *
 * Pure derivations over a collection. Nothing here holds state.
 */

import type { FilterMode, TaskRecord, TaskSummary } from './types.js';

function matchesFilter(task: TaskRecord, filterMode: FilterMode): boolean {
  switch (filterMode) {
    case 'all':
      return true;
    case 'active':
      return !task.completed;
    case 'completed':
      return task.completed;
  }
}

/**
 * Filter by completion and search titles (case-insensitive substring).
 * Both predicates must pass; source order is kept.
 */
export function derive(
  tasks: readonly TaskRecord[],
  filterMode: FilterMode,
  query: string
): TaskRecord[] {
  const needle = query.toLowerCase();
  return tasks.filter(
    (task) => matchesFilter(task, filterMode) && (needle === '' || task.title.toLowerCase().includes(needle))
  );
}

/**
 * Count tasks by completion state
 */
export function summarize(tasks: readonly TaskRecord[]): TaskSummary {
  const completed = tasks.filter((task) => task.completed).length;
  return {
    total: tasks.length,
    active: tasks.length - completed,
    completed,
  };
}

/**
 * Build a summary string (e.g., "2 active, 1 completed")
 */
export function formatSummary(summary: TaskSummary): string {
  const parts: string[] = [];
  if (summary.active > 0) parts.push(`${summary.active} active`);
  if (summary.completed > 0) parts.push(`${summary.completed} completed`);
  return parts.join(', ') || 'no tasks';
}
