export { TASK_COLUMNS, TaskRowSchema, toTaskRow, DONE, TODO } from './task-row.js';
export type { TaskColumn, TaskRow } from './task-row.js';
