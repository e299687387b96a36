/**
 * CLI helpers: argument conversion and the load/operate/save cycle.
 */

import type { MutationResult, Task, TaskId, TaskStore } from '@tasklog/core';
import { ValidationError } from '@tasklog/core';
import * as out from './output.js';

const TASK_ID_RE = /^\d+$/;

/** Convert an id argument, rejecting anything that is not a whole number */
export function parseTaskId(value: string): TaskId {
  const trimmed = value.trim();
  if (!TASK_ID_RE.test(trimmed)) {
    throw new ValidationError(`Invalid task id "${value}", expected a whole number`);
  }
  return Number(trimmed);
}

export function parseTaskIds(values: readonly string[]): TaskId[] {
  return values.map(parseTaskId);
}

/** Split `DATE [ID...]` arguments */
export function parseDateAndIds(values: readonly string[], flag: string): { date: string; ids: TaskId[] } {
  const [date, ...ids] = values;
  if (date === undefined) throw new ValidationError(`${flag} expects DATE [ID...]`);
  return { date, ids: parseTaskIds(ids) };
}

function load(store: TaskStore): Task[] {
  const tasks = store.load();
  out.debug(`Loaded ${tasks.length} task(s) from ${store.filePath}`);
  return tasks;
}

/** Run a mutating operation and persist its result when it changed anything */
export function mutate(store: TaskStore, operation: (tasks: Task[]) => MutationResult): void {
  const result = operation(load(store));

  if (!result.changed) {
    out.warning(result.message);
    return;
  }

  store.save(result.tasks);
  out.debug(`Saved ${result.tasks.length} task(s) to ${store.filePath}`);
  out.success(result.message);
}

/** Run a read-only operation; the file is never written */
export function query(store: TaskStore, operation: (tasks: Task[]) => Task[]): Task[] {
  return operation(load(store));
}
