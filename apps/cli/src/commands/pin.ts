import type { TaskStore } from '@tasklog/core';
import { togglePin } from '@tasklog/core';
import { mutate, parseTaskIds } from '../helpers.js';

export function runPin(store: TaskStore, values: readonly string[]): void {
  const ids = parseTaskIds(values);
  mutate(store, tasks => togglePin(tasks, ids));
}
