import type { TaskStore } from '@tasklog/core';
import { scheduleTasks, setDeadlines } from '@tasklog/core';
import { mutate, parseDateAndIds } from '../helpers.js';

export function runSchedule(store: TaskStore, values: readonly string[]): void {
  const { date, ids } = parseDateAndIds(values, '--schedule');
  mutate(store, tasks => scheduleTasks(tasks, date, ids));
}

export function runDeadline(store: TaskStore, values: readonly string[]): void {
  const { date, ids } = parseDateAndIds(values, '--deadline');
  mutate(store, tasks => setDeadlines(tasks, date, ids));
}
