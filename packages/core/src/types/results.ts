import type { Task } from './task.js';

/** Outcome of a mutating operation: the new collection plus a confirmation line */
export interface MutationResult {
  readonly tasks: Task[];
  readonly message: string;
  /** false when the operation left the collection as it was */
  readonly changed: boolean;
}

export function changed(tasks: Task[], message: string): MutationResult {
  return { tasks, message, changed: true };
}

export function unchanged(tasks: Task[], message: string): MutationResult {
  return { tasks, message, changed: false };
}
