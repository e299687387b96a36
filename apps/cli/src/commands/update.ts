import type { TaskStore } from '@tasklog/core';
import { ValidationError, updateTask } from '@tasklog/core';
import { mutate, parseTaskId } from '../helpers.js';

/** `--update ID DESC` */
export function runUpdate(store: TaskStore, values: readonly string[]): void {
  const [idArg, description, ...rest] = values;
  if (idArg === undefined || description === undefined || rest.length > 0) {
    throw new ValidationError('--update expects exactly ID and DESC (quote the description)');
  }

  const id = parseTaskId(idArg);
  mutate(store, tasks => updateTask(tasks, id, description));
}
