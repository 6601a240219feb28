/**
 * @fileoverview View Composer Tests
 */

import { describe, it, expect } from 'vitest';
import { derive, formatSummary, summarize } from '../view-composer.js';
import { createTaskRecord } from '../task-record.js';
import type { TaskRecord } from '../types.js';

function task(id: string, title: string, completed = false): TaskRecord {
  return createTaskRecord({ id, title, completed, createdAt: new Date('2024-01-01T00:00:00.000Z') });
}

const tasks: TaskRecord[] = [
  task('a', 'Write report', true),
  task('b', 'Buy MILK'),
  task('c', 'Milk the numbers', true),
  task('d', 'Call Bob'),
];

const ids = (list: readonly TaskRecord[]): string[] => list.map((t) => t.id);

describe('derive', () => {
  it('returns everything for all with an empty query', () => {
    expect(ids(derive(tasks, 'all', ''))).toEqual(['a', 'b', 'c', 'd']);
  });

  it('keeps only open tasks for active', () => {
    expect(ids(derive(tasks, 'active', ''))).toEqual(['b', 'd']);
  });

  it('keeps only done tasks for completed', () => {
    expect(ids(derive(tasks, 'completed', ''))).toEqual(['a', 'c']);
  });

  it('matches titles case-insensitively as substrings', () => {
    expect(ids(derive(tasks, 'all', 'milk'))).toEqual(['b', 'c']);
    expect(ids(derive(tasks, 'all', 'MiLk'))).toEqual(['b', 'c']);
  });

  it('ANDs filter and query', () => {
    expect(ids(derive(tasks, 'active', 'milk'))).toEqual(['b']);
    expect(ids(derive(tasks, 'completed', 'milk'))).toEqual(['c']);
    expect(ids(derive(tasks, 'completed', 'bob'))).toEqual([]);
  });

  it('searches the title only, not the description', () => {
    const withNotes = [createTaskRecord({ id: 'x', title: 'Groceries', description: 'milk and eggs' })];
    expect(derive(withNotes, 'all', 'milk')).toEqual([]);
  });

  it('partitions the collection between active and completed', () => {
    const active = derive(tasks, 'active', '');
    const completed = derive(tasks, 'completed', '');

    expect(new Set([...ids(active), ...ids(completed)])).toEqual(new Set(ids(tasks)));
    expect(ids(active).filter((id) => ids(completed).includes(id))).toEqual([]);
  });

  it('does not modify the source', () => {
    const source = [...tasks];
    derive(source, 'active', 'bob');
    expect(source).toEqual(tasks);
  });
});

describe('summarize', () => {
  it('counts by completion state', () => {
    expect(summarize(tasks)).toEqual({ total: 4, active: 2, completed: 2 });
  });

  it('handles an empty collection', () => {
    expect(summarize([])).toEqual({ total: 0, active: 0, completed: 0 });
  });
});

describe('formatSummary', () => {
  it('lists non-zero counts', () => {
    expect(formatSummary({ total: 3, active: 2, completed: 1 })).toBe('2 active, 1 completed');
    expect(formatSummary({ total: 2, active: 0, completed: 2 })).toBe('2 completed');
  });

  it('says no tasks when empty', () => {
    expect(formatSummary({ total: 0, active: 0, completed: 0 })).toBe('no tasks');
  });
});
