import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import type { Task } from '@tasklog/core';
import { debug, formatTaskTable, printTasks, setVerbose } from '../src/output.js';

function task(id: number, description: string, overrides: Partial<Task> = {}): Task {
  return {
    id,
    description,
    done: false,
    scheduledDate: null,
    deadlineDate: null,
    createdAt: null,
    pinned: false,
    visible: true,
    doneDate: null,
    ...overrides,
  };
}

beforeEach(() => {
  chalk.level = 0;
});

describe('formatTaskTable', () => {
  it('shows id, status and description by default', () => {
    expect(formatTaskTable([task(1, 'buy milk'), task(2, 'walk', { done: true })])).toEqual([
      'id  status  description',
      '1   TODO    buy milk',
      '2   DONE    walk',
    ]);
  });

  it('adds a pin column when a task is pinned', () => {
    expect(formatTaskTable([task(2, 'b', { pinned: true }), task(1, 'a')])).toEqual([
      '   id  status  description',
      '*  2   TODO    b',
      '   1   TODO    a',
    ]);
  });

  it('adds date columns only when some task has one', () => {
    const lines = formatTaskTable([
      task(1, 'a', { deadlineDate: '2025-06-30' }),
      task(2, 'b'),
    ]);
    expect(lines).toEqual([
      'id  status  description  deadline',
      '1   TODO    a            2025-06-30',
      '2   TODO    b',
    ]);
  });

  it('shows visibility in dump views', () => {
    expect(formatTaskTable([task(1, 'a'), task(2, 'gone', { visible: false })], { includeHidden: true })).toEqual([
      'id  status  description  visible',
      '1   TODO    a            yes',
      '2   TODO    gone         no',
    ]);
  });

  it('keeps multi-line descriptions on one row', () => {
    expect(formatTaskTable([task(1, 'first\nsecond')])[1]).toBe('1   TODO    first ↵ second');
  });
});

describe('printTasks', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the empty message when there is nothing to show', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    printTasks([], 'No active tasks found.');
    expect(log).toHaveBeenCalledOnce();
    expect(log).toHaveBeenCalledWith('No active tasks found.');
  });
});

describe('debug', () => {
  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  it('is silent unless verbose output is enabled', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    debug('hidden');
    expect(err).not.toHaveBeenCalled();

    setVerbose(true);
    debug('shown');
    expect(err).toHaveBeenCalledWith('shown');
  });
});
