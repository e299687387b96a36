/**
 * chalk-based terminal output. Confirmations and tables go to stdout,
 * errors and diagnostics to stderr.
 */

import chalk from 'chalk';
import type { Task } from '@tasklog/core';

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Task tables ---

interface Column {
  readonly header: string;
  readonly cell: (task: Task) => string;
}

export interface TableOptions {
  /** Dump views: add visibility and completion columns */
  readonly includeHidden?: boolean;
}

const PIN_COLUMN: Column = { header: '', cell: t => (t.pinned ? '*' : '') };
const ID_COLUMN: Column = { header: 'id', cell: t => String(t.id) };
const STATUS_COLUMN: Column = { header: 'status', cell: t => (t.done ? 'DONE' : 'TODO') };
const DESCRIPTION_COLUMN: Column = { header: 'description', cell: t => singleLine(t.description) };
const SCHEDULED_COLUMN: Column = { header: 'scheduled', cell: t => t.scheduledDate ?? '' };
const DEADLINE_COLUMN: Column = { header: 'deadline', cell: t => t.deadlineDate ?? '' };
const VISIBLE_COLUMN: Column = { header: 'visible', cell: t => (t.visible ? 'yes' : 'no') };
const DONE_ON_COLUMN: Column = { header: 'done on', cell: t => t.doneDate ?? '' };

function singleLine(s: string): string {
  return s.replace(/\s*\r?\n\s*/g, ' ↵ ');
}

function columnsFor(tasks: readonly Task[], options: TableOptions): Column[] {
  const columns: Column[] = [];
  if (tasks.some(t => t.pinned)) columns.push(PIN_COLUMN);
  columns.push(ID_COLUMN, STATUS_COLUMN, DESCRIPTION_COLUMN);
  if (tasks.some(t => t.scheduledDate)) columns.push(SCHEDULED_COLUMN);
  if (tasks.some(t => t.deadlineDate)) columns.push(DEADLINE_COLUMN);
  if (options.includeHidden) {
    columns.push(VISIBLE_COLUMN);
    if (tasks.some(t => t.doneDate)) columns.push(DONE_ON_COLUMN);
  }
  return columns;
}

function joinCells(cells: readonly string[], widths: readonly number[]): string {
  return cells.map((c, i) => c.padEnd(widths[i] ?? 0)).join('  ').trimEnd();
}

function rowStyle(task: Task): (s: string) => string {
  if (!task.visible) return chalk.dim;
  if (task.done) return chalk.green;
  if (task.pinned) return chalk.yellow;
  return s => s;
}

/** Aligned table lines, header first. Columns without any value are left out. */
export function formatTaskTable(tasks: readonly Task[], options: TableOptions = {}): string[] {
  const columns = columnsFor(tasks, options);
  const rows = tasks.map(t => columns.map(c => c.cell(t)));
  const widths = columns.map((c, i) => Math.max(c.header.length, ...rows.map(r => (r[i] ?? '').length)));

  const header = chalk.bold(joinCells(columns.map(c => c.header), widths));
  const body = tasks.map((t, i) => rowStyle(t)(joinCells(rows[i] ?? [], widths)));
  return [header, ...body];
}

export function printTasks(tasks: readonly Task[], emptyMessage: string, options: TableOptions = {}): void {
  if (tasks.length === 0) {
    info(emptyMessage);
    return;
  }
  for (const line of formatTaskTable(tasks, options)) {
    console.log(line);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

/** Diagnostics, shown only with --verbose */
export function debug(message: string): void {
  if (verbose) console.error(chalk.dim(message));
}

/** Text produced by commander itself (help, usage errors) */
export function writeOut(text: string): void {
  console.log(text.replace(/\n$/, ''));
}

export function writeErr(text: string): void {
  console.error(text.replace(/\n$/, ''));
}
