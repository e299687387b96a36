/**
 * Command operations. Each one is a pure function from the current
 * collection to either a view or a MutationResult; the store decides
 * whether anything is written.
 */

import type { IsoDate, Task, TaskId } from '../types/task.js';
import type { MutationResult } from '../types/results.js';
import { changed, unchanged } from '../types/results.js';
import { ValidationError } from '../errors.js';
import { isIsoDate } from '../parsers/date-parser.js';
import { compilePattern, matchesPattern } from '../parsers/pattern.js';
import { renumber, sortTasksForDisplay } from '../store/renumber.js';
import {
  createTask,
  hidden,
  mapActive,
  maxId,
  normalizeDescription,
  resolveActiveIds,
  resolveStoredIds,
  withDeadlineDate,
  withDoneToggled,
  withPinToggled,
  withScheduledDate,
} from './task-helpers.js';

/** Keyword accepted by schedule and deadline to unset the date */
export const CLEAR_DATE = 'clear';

// --- Queries ---

/** Visible tasks matching the pattern, pinned first. An empty pattern lists everything. */
export function listTasks(tasks: readonly Task[], pattern?: string | null): Task[] {
  const re = compilePattern(pattern);
  return sortTasksForDisplay(tasks).filter(t => matchesPattern(t.description, re));
}

/** Every stored task, hidden ones included, in id order */
export function dumpTasks(tasks: readonly Task[], pattern?: string | null): Task[] {
  const re = compilePattern(pattern);
  return [...tasks]
    .sort((a, b) => a.id - b.id)
    .filter(t => matchesPattern(t.description, re));
}

// --- Mutations ---

export function addTasks(tasks: readonly Task[], descriptions: readonly string[], now?: Date): MutationResult {
  if (descriptions.length === 0) throw new ValidationError('Nothing to add');

  const createdAt = now ?? new Date();
  const firstId = maxId(tasks) + 1;
  const added = descriptions.map((d, i) => createTask(firstId + i, d, createdAt));

  return changed(renumber([...tasks, ...added]), `Added ${added.length} task(s)`);
}

export function updateTask(tasks: readonly Task[], id: TaskId, description: string): MutationResult {
  const trimmed = normalizeDescription(description);
  const ids = resolveActiveIds(tasks, [id]);

  const current = tasks.find(t => t.visible && t.id === id);
  if (current?.description === trimmed) {
    return unchanged([...tasks], `Task ${id} already has that description`);
  }
  return changed(mapActive(tasks, ids, t => ({ ...t, description: trimmed })), `Updated task ${id}`);
}

/** Flip done on each task. Applying it twice restores the original state. */
export function toggleDone(tasks: readonly Task[], ids: readonly TaskId[], now?: Date): MutationResult {
  const targets = resolveActiveIds(tasks, ids);
  const next = mapActive(tasks, targets, t => withDoneToggled(t, now));
  return changed(renumber(next), `Toggled done on ${targets.size} task(s)`);
}

function resolveDateArg(date: string): IsoDate | null {
  const trimmed = date.trim();
  if (trimmed.toLowerCase() === CLEAR_DATE) return null;
  if (!isIsoDate(trimmed)) {
    throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return trimmed;
}

export function scheduleTasks(tasks: readonly Task[], date: string, ids: readonly TaskId[]): MutationResult {
  // Date is validated before any id
  const value = resolveDateArg(date);
  const targets = resolveActiveIds(tasks, ids);
  if (targets.size === 0) return unchanged([...tasks], 'No task ids given, nothing scheduled');

  const next = mapActive(tasks, targets, t => withScheduledDate(t, value));
  return changed(next, value === null
    ? `Cleared schedule of ${targets.size} task(s)`
    : `Scheduled ${targets.size} task(s) for ${value}`);
}

export function setDeadlines(tasks: readonly Task[], date: string, ids: readonly TaskId[]): MutationResult {
  const value = resolveDateArg(date);
  const targets = resolveActiveIds(tasks, ids);
  if (targets.size === 0) return unchanged([...tasks], 'No task ids given, no deadline set');

  const next = mapActive(tasks, targets, t => withDeadlineDate(t, value));
  return changed(next, value === null
    ? `Cleared deadline of ${targets.size} task(s)`
    : `Set deadline ${value} on ${targets.size} task(s)`);
}

/** Pinning toggles; ids are not reassigned, only the listing order changes */
export function togglePin(tasks: readonly Task[], ids: readonly TaskId[]): MutationResult {
  const targets = resolveActiveIds(tasks, ids);
  return changed(mapActive(tasks, targets, withPinToggled), `Toggled pin on ${targets.size} task(s)`);
}

/** Soft delete: the rows stay in storage and in dump */
export function deleteTasks(tasks: readonly Task[], ids: readonly TaskId[]): MutationResult {
  const targets = resolveActiveIds(tasks, ids);
  return changed(renumber(mapActive(tasks, targets, hidden)), `Deleted ${targets.size} task(s)`);
}

/** Hide every visible done task */
export function pruneDone(tasks: readonly Task[]): MutationResult {
  const pruned = tasks.filter(t => t.visible && t.done).length;
  if (pruned === 0) return unchanged([...tasks], 'No done tasks to prune');

  const next = tasks.map(t => (t.visible && t.done ? hidden(t) : t));
  return changed(renumber(next), `Pruned ${pruned} done task(s)`);
}

/** Permanently remove rows by storage id (as shown by dump), then re-densify the ids */
export function purgeTasks(tasks: readonly Task[], ids: readonly TaskId[]): MutationResult {
  const targets = resolveStoredIds(tasks, ids);
  const next = tasks.filter(t => !targets.has(t.id));
  return changed(renumber(next), `Purged ${targets.size} task(s)`);
}
