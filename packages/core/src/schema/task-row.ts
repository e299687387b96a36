import { z } from 'zod';
import { isIsoDate } from '../parsers/date-parser.js';
import type { Task } from '../types/task.js';

/** Column order of the task file. Matches files written by earlier versions of the tool. */
export const TASK_COLUMNS = [
  'id',
  'status',
  'desc',
  'scheduled',
  'deadline',
  'created',
  'is_visible',
  'is_pin',
  'done_date',
] as const;

export type TaskColumn = (typeof TASK_COLUMNS)[number];

/** One CSV record before decoding: every field is text */
export type TaskRow = Record<TaskColumn, string>;

export const DONE = 'DONE';
export const TODO = 'TODO';

const flag = z.enum(['true', 'false']).transform(v => v === 'true');

/** yyyy-MM-dd or the empty field */
const optionalDate = z.string()
  .refine(v => v === '' || isIsoDate(v), { message: 'expected yyyy-MM-dd or an empty field' })
  .transform(v => (v === '' ? null : v));

const optionalTimestamp = z.string()
  .refine(v => v === '' || !isNaN(Date.parse(v)), { message: 'expected an ISO timestamp or an empty field' })
  .transform(v => (v === '' ? null : v));

export const TaskRowSchema = z.object({
  id: z.string()
    .regex(/^[1-9]\d*$/, 'expected a positive integer')
    .transform(Number),
  status: z.enum([TODO, DONE]).transform(v => v === DONE),
  desc: z.string(),
  scheduled: optionalDate,
  deadline: optionalDate,
  created: optionalTimestamp,
  is_visible: flag,
  is_pin: flag,
  done_date: optionalDate,
}).transform((row): Task => ({
  id: row.id,
  description: row.desc,
  done: row.status,
  scheduledDate: row.scheduled,
  deadlineDate: row.deadline,
  createdAt: row.created,
  pinned: row.is_pin,
  visible: row.is_visible,
  doneDate: row.done_date,
}));

export function toTaskRow(task: Task): TaskRow {
  return {
    id: String(task.id),
    status: task.done ? DONE : TODO,
    desc: task.description,
    scheduled: task.scheduledDate ?? '',
    deadline: task.deadlineDate ?? '',
    created: task.createdAt ?? '',
    is_visible: String(task.visible),
    is_pin: String(task.pinned),
    done_date: task.doneDate ?? '',
  };
}
