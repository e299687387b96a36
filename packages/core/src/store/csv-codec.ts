/**
 * Text encoding of the task file: one header row, then one RFC 4180 record per task.
 * Hidden tasks are written like any other row.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { describeError } from '../errors.js';
import { TASK_COLUMNS, TaskRowSchema, toTaskRow } from '../schema/task-row.js';
import type { Task } from '../types/task.js';

const RecordsSchema = z.array(z.array(z.string()));

/** Raised by decodeTasks; the store adds the file path */
export class CsvFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CsvFormatError';
  }
}

export function encodeTasks(tasks: readonly Task[]): string {
  return stringify(tasks.map(toTaskRow), {
    header: true,
    columns: [...TASK_COLUMNS],
  });
}

/**
 * Decode file contents. An empty document is an empty collection;
 * anything else must start with the exact header.
 */
export function decodeTasks(text: string): Task[] {
  let parsed: unknown;
  try {
    parsed = parse(text, { bom: true, skip_empty_lines: true });
  } catch (err: unknown) {
    throw new CsvFormatError(`Invalid CSV: ${describeError(err)}`, { cause: err });
  }

  const records = RecordsSchema.safeParse(parsed);
  if (!records.success) {
    throw new CsvFormatError('Invalid CSV: records are not rows of text fields');
  }

  const [header, ...rows] = records.data;
  if (header === undefined) return [];

  if (header.join(',') !== TASK_COLUMNS.join(',')) {
    throw new CsvFormatError(`Unexpected header "${header.join(',')}", expected "${TASK_COLUMNS.join(',')}"`);
  }

  const seen = new Set<number>();
  return rows.map((fields, index) => {
    // Record 1 is the header
    const recordNo = index + 2;
    const row = Object.fromEntries(TASK_COLUMNS.map((column, i) => [column, fields[i]]));
    const result = TaskRowSchema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
      throw new CsvFormatError(`Malformed record ${recordNo}: ${where}`);
    }
    if (seen.has(result.data.id)) {
      throw new CsvFormatError(`Malformed record ${recordNo}: duplicate id ${result.data.id}`);
    }
    seen.add(result.data.id);
    return result.data;
  });
}
