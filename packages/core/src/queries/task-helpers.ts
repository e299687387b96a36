import type { IsoDate, Task, TaskId } from '../types/task.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { formatDate } from '../parsers/date-parser.js';

/** Trimmed description, or ValidationError when nothing is left */
export function normalizeDescription(description: string): string {
  const trimmed = description.trim();
  if (!trimmed) throw new ValidationError('Task description cannot be empty');
  return trimmed;
}

/** Create a new visible, open task */
export function createTask(id: TaskId, description: string, now?: Date): Task {
  return {
    id,
    description: normalizeDescription(description),
    done: false,
    scheduledDate: null,
    deadlineDate: null,
    createdAt: (now ?? new Date()).toISOString(),
    pinned: false,
    visible: true,
    doneDate: null,
  };
}

/** Return a copy with `done` flipped; doneDate follows the new state */
export function withDoneToggled(task: Task, now?: Date): Task {
  const done = !task.done;
  return {
    ...task,
    done,
    doneDate: done ? formatDate(now ?? new Date()) : null,
  };
}

export function withScheduledDate(task: Task, date: IsoDate | null): Task {
  return { ...task, scheduledDate: date };
}

export function withDeadlineDate(task: Task, date: IsoDate | null): Task {
  return { ...task, deadlineDate: date };
}

export function withPinToggled(task: Task): Task {
  return { ...task, pinned: !task.pinned };
}

export function hidden(task: Task): Task {
  return { ...task, visible: false };
}

/** Highest storage id, hidden rows included; 0 for an empty collection */
export function maxId(tasks: readonly Task[]): TaskId {
  return tasks.reduce((max, t) => Math.max(max, t.id), 0);
}

/**
 * Resolve user-facing ids against the visible tasks.
 * Every id is checked before anything is returned; duplicates collapse.
 */
export function resolveActiveIds(tasks: readonly Task[], ids: readonly TaskId[]): Set<TaskId> {
  const resolved = new Set<TaskId>();
  for (const id of ids) {
    if (!tasks.some(t => t.visible && t.id === id)) throw new NotFoundError(id);
    resolved.add(id);
  }
  return resolved;
}

/** Same as resolveActiveIds, over every stored row */
export function resolveStoredIds(tasks: readonly Task[], ids: readonly TaskId[]): Set<TaskId> {
  const resolved = new Set<TaskId>();
  for (const id of ids) {
    if (!tasks.some(t => t.id === id)) throw new NotFoundError(id, 'stored');
    resolved.add(id);
  }
  return resolved;
}

/** Apply `fn` to the visible tasks whose id is in `ids` */
export function mapActive(tasks: readonly Task[], ids: ReadonlySet<TaskId>, fn: (task: Task) => Task): Task[] {
  return tasks.map(t => (t.visible && ids.has(t.id) ? fn(t) : t));
}
