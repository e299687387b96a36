import type { TaskStore } from '@tasklog/core';
import { pruneDone, toggleDone } from '@tasklog/core';
import { mutate, parseTaskIds } from '../helpers.js';

export function runDone(store: TaskStore, values: readonly string[]): void {
  const ids = parseTaskIds(values);
  mutate(store, tasks => toggleDone(tasks, ids));
}

export function runPrune(store: TaskStore): void {
  mutate(store, pruneDone);
}
