import type { TaskId } from './types/task.js';

export type TaskErrorCode = 'validation' | 'not-found' | 'storage';

/** Base class for every failure reported to the user */
export abstract class TaskError extends Error {
  abstract readonly code: TaskErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input: malformed date, empty description, bad pattern, conflicting flags */
export class ValidationError extends TaskError {
  readonly code = 'validation';
}

/** An id that does not address any task in scope */
export class NotFoundError extends TaskError {
  readonly code = 'not-found';

  constructor(readonly taskId: TaskId, scope: 'active' | 'stored' = 'active') {
    super(scope === 'active'
      ? `Could not find active task with id ${taskId}`
      : `Could not find stored task with id ${taskId}`);
  }
}

/** The task file could not be read, parsed or written */
export class StorageError extends TaskError {
  readonly code = 'storage';

  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isTaskError(err: unknown): err is TaskError {
  return err instanceof TaskError;
}

/** Message of an unknown thrown value */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
