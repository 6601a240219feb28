/**
 * @fileoverview Task list error types
 *
 * Typed error hierarchy for the task list, so callers can branch on
 * `instanceof` or `code` instead of inspecting messages.
 */

/**
 * Centralized error codes
 */
export const TaskListErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  DUPLICATE_TASK_ID: 'DUPLICATE_TASK_ID',
  CORRUPT_STORAGE: 'CORRUPT_STORAGE',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
} as const;

export type TaskListErrorCodeType = (typeof TaskListErrorCode)[keyof typeof TaskListErrorCode];

/**
 * Base task list error class
 */
export class TaskListError extends Error {
  override readonly name: string = 'TaskListError';

  constructor(
    public readonly code: TaskListErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Input failed a precondition (e.g. a blank title)
 */
export class ValidationError extends TaskListError {
  override readonly name = 'ValidationError';

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(TaskListErrorCode.VALIDATION_FAILED, message);
  }
}

/**
 * No task with the given id
 */
export class NotFoundError extends TaskListError {
  override readonly name = 'NotFoundError';

  constructor(public readonly taskId: string) {
    super(TaskListErrorCode.TASK_NOT_FOUND, `Task not found: ${taskId}`);
  }
}

/**
 * A reorder index outside [0, length)
 */
export class IndexOutOfRangeError extends TaskListError {
  override readonly name = 'IndexOutOfRangeError';

  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(TaskListErrorCode.INDEX_OUT_OF_RANGE, `Index ${index} is out of range for ${length} task(s)`);
  }
}

/**
 * The id generator produced an id that is already in the collection
 */
export class DuplicateTaskIdError extends TaskListError {
  override readonly name = 'DuplicateTaskIdError';

  constructor(public readonly taskId: string) {
    super(TaskListErrorCode.DUPLICATE_TASK_ID, `Task id already exists: ${taskId}`);
  }
}

/**
 * Persisted data could not be decoded
 */
export class CorruptStorageError extends TaskListError {
  override readonly name = 'CorruptStorageError';

  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(TaskListErrorCode.CORRUPT_STORAGE, message, options);
  }
}

/**
 * The key-value engine failed to read or write
 */
export class PersistenceError extends TaskListError {
  override readonly name = 'PersistenceError';

  constructor(
    message: string,
    public readonly operation: 'load' | 'save',
    options?: { cause?: unknown }
  ) {
    super(TaskListErrorCode.PERSISTENCE_FAILED, message, options);
  }
}

/**
 * Type guard for task list errors
 */
export function isTaskListError(error: unknown): error is TaskListError {
  return error instanceof TaskListError;
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
