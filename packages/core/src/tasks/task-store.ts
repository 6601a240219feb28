/**
 * @fileoverview Task Store
 *
 * Adapter between the task collection and a key-value engine. The whole
 * collection is encoded as one JSON array under a single key; every save
 * overwrites it.
 */

import type { KeyValueStore } from '../storage/index.js';
import { CorruptStorageError, PersistenceError, errorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { DEFAULT_STORAGE_KEY } from '../settings/index.js';
import { createTaskRecord } from './task-record.js';
import { storedCollectionSchema, storedTaskSchema, type StoredTask } from './schemas.js';
import type { TaskRecord } from './types.js';

const logger = createLogger('task-store');

// =============================================================================
// Encoding
// =============================================================================

export function encodeTaskRecord(record: TaskRecord): StoredTask {
  return {
    id: record.id,
    title: record.title,
    description: record.description ?? null,
    completed: record.completed,
    createdAt: record.createdAt.toISOString(),
  };
}

/**
 * Decode one stored element
 * @returns the record, or a description of why the element is malformed
 */
export function decodeTaskRecord(value: unknown): { record: TaskRecord } | { error: string } {
  const parsed = storedTaskSchema.safeParse(value);
  if (!parsed.success) {
    return {
      error: parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'task'}: ${issue.message}`)
        .join('; '),
    };
  }

  const stored = parsed.data;
  return {
    record: createTaskRecord({
      id: stored.id,
      title: stored.title,
      description: stored.description,
      completed: stored.completed,
      createdAt: new Date(stored.createdAt),
    }),
  };
}

// =============================================================================
// TaskStore
// =============================================================================

export interface TaskStoreOptions {
  /** Key the collection lives under (default "TODOS") */
  key?: string;
}

export class TaskStore {
  private readonly kv: KeyValueStore;
  readonly key: string;

  constructor(kv: KeyValueStore, options: TaskStoreOptions = {}) {
    this.kv = kv;
    this.key = options.key ?? DEFAULT_STORAGE_KEY;
  }

  /**
   * Read and decode the stored collection. A missing key is an empty collection.
   * @throws CorruptStorageError if the stored value cannot be decoded
   * @throws PersistenceError if the engine fails
   */
  async load(): Promise<TaskRecord[]> {
    let text: string | null;
    try {
      text = await this.kv.get(this.key);
    } catch (error) {
      throw new PersistenceError(`Failed to read "${this.key}": ${errorMessage(error)}`, 'load', { cause: error });
    }

    if (text === null) {
      logger.debug('No stored collection', { key: this.key });
      return [];
    }

    const tasks = this.decodeCollection(text);
    logger.debug('Collection loaded', { key: this.key, taskCount: tasks.length });
    return tasks;
  }

  /**
   * Encode and write the whole collection, replacing the stored value.
   * @throws PersistenceError if the engine fails
   */
  async save(tasks: readonly TaskRecord[]): Promise<void> {
    const text = JSON.stringify(tasks.map(encodeTaskRecord));
    try {
      await this.kv.set(this.key, text);
    } catch (error) {
      throw new PersistenceError(`Failed to write "${this.key}": ${errorMessage(error)}`, 'save', { cause: error });
    }
    logger.debug('Collection saved', { key: this.key, taskCount: tasks.length });
  }

  private decodeCollection(text: string): TaskRecord[] {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CorruptStorageError(`Stored value under "${this.key}" is not valid JSON`, this.key, { cause: error });
    }

    const collection = storedCollectionSchema.safeParse(raw);
    if (!collection.success) {
      throw new CorruptStorageError(`Stored value under "${this.key}" is not an array`, this.key);
    }

    const tasks: TaskRecord[] = [];
    const seen = new Set<string>();
    collection.data.forEach((element, index) => {
      const decoded = decodeTaskRecord(element);
      if ('error' in decoded) {
        throw new CorruptStorageError(`Stored task at index ${index} is malformed: ${decoded.error}`, this.key);
      }
      if (seen.has(decoded.record.id)) {
        throw new CorruptStorageError(`Stored task id "${decoded.record.id}" appears more than once`, this.key);
      }
      seen.add(decoded.record.id);
      tasks.push(decoded.record);
    });
    return tasks;
  }
}
