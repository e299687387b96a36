import type { TaskStore } from '@tasklog/core';
import { dumpTasks, listTasks } from '@tasklog/core';
import * as out from '../output.js';
import { query } from '../helpers.js';

export function runList(store: TaskStore, pattern: string | null): void {
  const tasks = query(store, all => listTasks(all, pattern));
  out.printTasks(tasks, 'No active tasks found.');
}

/** Diagnostic listing of every stored row, hidden ones included */
export function runDump(store: TaskStore, pattern: string | null): void {
  const tasks = query(store, all => dumpTasks(all, pattern));
  out.printTasks(tasks, 'No tasks found.', { includeHidden: true });
}
