/**
 * @fileoverview TaskRecord construction
 *
 * Factory and copy-with-changes helpers. Both paths normalize title and
 * description the same way.
 */

import { randomUUID } from 'crypto';
import { ValidationError } from '../errors/index.js';
import type { NewTaskRecord, TaskChanges, TaskRecord } from './types.js';

/**
 * Default id generator
 */
export function generateTaskId(): string {
  return `task_${randomUUID()}`;
}

/**
 * Trim a title, rejecting blank input
 */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Title must not be empty', 'title');
  }
  return trimmed;
}

/**
 * Trim a description; blank or missing becomes undefined
 */
export function normalizeDescription(description: string | null | undefined): string | undefined {
  const trimmed = description?.trim();
  return trimmed ? trimmed : undefined;
}

function freeze(
  id: string,
  title: string,
  description: string | undefined,
  completed: boolean,
  createdAt: Date
): TaskRecord {
  const record: TaskRecord = description === undefined
    ? { id, title, completed, createdAt }
    : { id, title, description, completed, createdAt };
  return Object.freeze(record);
}

/**
 * Build a new, normalized record
 * @throws ValidationError if the title is blank
 */
export function createTaskRecord(input: NewTaskRecord): TaskRecord {
  return freeze(
    input.id,
    normalizeTitle(input.title),
    normalizeDescription(input.description),
    input.completed ?? false,
    input.createdAt ?? new Date()
  );
}

/**
 * Copy a record with overrides. id and createdAt always carry over.
 * @throws ValidationError if an overriding title is blank
 */
export function withChanges(record: TaskRecord, changes: TaskChanges): TaskRecord {
  const title = changes.title === undefined ? record.title : normalizeTitle(changes.title);
  const description = changes.description === undefined
    ? record.description
    : normalizeDescription(changes.description);

  return freeze(
    record.id,
    title,
    description,
    changes.completed ?? record.completed,
    record.createdAt
  );
}
