import type { TaskStore } from '@tasklog/core';
import { deleteTasks, purgeTasks } from '@tasklog/core';
import { mutate, parseTaskIds } from '../helpers.js';

/** Hide tasks; they remain visible to --dump */
export function runDelete(store: TaskStore, values: readonly string[]): void {
  const ids = parseTaskIds(values);
  mutate(store, tasks => deleteTasks(tasks, ids));
}

/** Remove rows for good, addressed by the ids --dump shows */
export function runPurge(store: TaskStore, values: readonly string[]): void {
  const ids = parseTaskIds(values);
  mutate(store, tasks => purgeTasks(tasks, ids));
}
