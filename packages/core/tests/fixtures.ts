import type { Task } from '../src/types/task.js';

/** A visible, open task with fixed timestamps */
export function makeTask(id: number, description: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    description,
    done: false,
    scheduledDate: null,
    deadlineDate: null,
    createdAt: '2025-01-01T09:00:00.000Z',
    pinned: false,
    visible: true,
    doneDate: null,
    ...overrides,
  };
}

/** Ids of the visible tasks, ascending */
export function visibleIds(tasks: readonly Task[]): number[] {
  return tasks.filter(t => t.visible).map(t => t.id).sort((a, b) => a - b);
}
