/**
 * File-backed task collection. The whole file is read once per process
 * and rewritten whole; writes go through a temporary file and a rename
 * so a failed save leaves the previous file in place.
 *
 * No locking: when two processes save, the last one wins.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StorageError, describeError } from '../errors.js';
import type { Task } from '../types/task.js';
import { getDefaultStorePath } from '../paths.js';
import { CsvFormatError, decodeTasks, encodeTasks } from './csv-codec.js';
import { hasDenseIds, renumber } from './renumber.js';

export class TaskStore {
  readonly filePath: string;

  constructor(filePath?: string) {
    this.filePath = filePath ?? getDefaultStorePath();
  }

  /**
   * Read every task, hidden ones included. Creates an empty file on first use.
   * A file whose visible ids have gaps is renumbered in memory; the fix is
   * written back with the next save.
   */
  load(): Task[] {
    if (!existsSync(this.filePath)) {
      this.save([]);
      return [];
    }

    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (err: unknown) {
      throw new StorageError(`Could not read ${this.filePath}: ${describeError(err)}`, this.filePath, { cause: err });
    }

    let tasks: Task[];
    try {
      tasks = decodeTasks(text);
    } catch (err: unknown) {
      if (err instanceof CsvFormatError) {
        throw new StorageError(`${this.filePath}: ${err.message}`, this.filePath, { cause: err });
      }
      throw err;
    }

    return hasDenseIds(tasks) ? tasks : renumber(tasks);
  }

  /** Replace the file contents with the given tasks */
  save(tasks: readonly Task[]): void {
    const content = encodeTasks(tasks);
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, content, 'utf8');
      renameSync(tmpPath, this.filePath);
    } catch (err: unknown) {
      if (existsSync(tmpPath)) rmSync(tmpPath, { force: true });
      throw new StorageError(`Could not write ${this.filePath}: ${describeError(err)}`, this.filePath, { cause: err });
    }
  }
}
