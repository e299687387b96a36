import type { Task } from '../types/task.js';

/** Listing order: pinned first, then by id */
export function compareForDisplay(a: Task, b: Task): number {
  if (a.pinned !== b.pinned) return a.pinned ? -1 : 1;
  return a.id - b.id;
}

/** Visible tasks in listing order */
export function sortTasksForDisplay(tasks: readonly Task[]): Task[] {
  return tasks.filter(t => t.visible).sort(compareForDisplay);
}

/** True when the visible ids are exactly 1..N, in any order */
export function hasDenseIds(tasks: readonly Task[]): boolean {
  const ids = new Set(tasks.filter(t => t.visible).map(t => t.id));
  for (let id = 1; id <= ids.size; id++) {
    if (!ids.has(id)) return false;
  }
  return true;
}

/**
 * Reassign ids. Visible tasks take 1..N in listing order; hidden tasks
 * follow with N+1.. in their previous id order so every row stays unique.
 * The result is in id order.
 */
export function renumber(tasks: readonly Task[]): Task[] {
  const visible = sortTasksForDisplay(tasks);
  const hidden = tasks.filter(t => !t.visible).sort((a, b) => a.id - b.id);

  return [...visible, ...hidden].map((task, index) => (
    task.id === index + 1 ? task : { ...task, id: index + 1 }
  ));
}
