import type { TaskStore } from '@tasklog/core';
import { addTasks } from '@tasklog/core';
import { mutate } from '../helpers.js';

export function runAdd(store: TaskStore, descriptions: readonly string[]): void {
  mutate(store, tasks => addTasks(tasks, descriptions));
}
