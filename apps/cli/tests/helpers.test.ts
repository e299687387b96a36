import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import chalk from 'chalk';
import { TaskStore, ValidationError, addTasks, unchanged } from '@tasklog/core';
import { mutate, parseDateAndIds, parseTaskId, parseTaskIds, query } from '../src/helpers.js';

describe('parseTaskId', () => {
  it('parses whole numbers', () => {
    expect(parseTaskId('7')).toBe(7);
    expect(parseTaskId(' 12 ')).toBe(12);
  });

  it('rejects anything else', () => {
    expect(() => parseTaskId('1.5')).toThrow(ValidationError);
    expect(() => parseTaskId('-1')).toThrow('Invalid task id "-1", expected a whole number');
    expect(() => parseTaskId('one')).toThrow(ValidationError);
  });
});

describe('parseTaskIds', () => {
  it('converts every value', () => {
    expect(parseTaskIds(['1', '2', '3'])).toEqual([1, 2, 3]);
  });
});

describe('parseDateAndIds', () => {
  it('splits the date from the ids', () => {
    expect(parseDateAndIds(['2025-01-01', '1', '2'], '--schedule')).toEqual({ date: '2025-01-01', ids: [1, 2] });
  });

  it('allows a date without ids', () => {
    expect(parseDateAndIds(['2025-01-01'], '--deadline')).toEqual({ date: '2025-01-01', ids: [] });
  });

  it('requires a date', () => {
    expect(() => parseDateAndIds([], '--schedule')).toThrow('--schedule expects DATE [ID...]');
  });
});

describe('mutate and query', () => {
  let tmpDir: string;
  let store: TaskStore;

  beforeEach(() => {
    chalk.level = 0;
    tmpDir = mkdtempSync(join(tmpdir(), 'tasklog-helpers-test-'));
    store = new TaskStore(join(tmpDir, 'tasks.csv'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('saves a changed collection and prints the confirmation', () => {
    mutate(store, tasks => addTasks(tasks, ['write tests']));
    expect(store.load().map(t => t.description)).toEqual(['write tests']);
    expect(vi.mocked(console.log)).toHaveBeenCalledWith('Added 1 task(s)');
  });

  it('does not write when nothing changed', () => {
    mutate(store, tasks => addTasks(tasks, ['keep me']));
    const before = readFileSync(store.filePath, 'utf8');

    mutate(store, tasks => unchanged(tasks.map(t => ({ ...t, description: 'discarded' })), 'Nothing to do'));
    expect(readFileSync(store.filePath, 'utf8')).toBe(before);
    expect(vi.mocked(console.log)).toHaveBeenLastCalledWith('Nothing to do');
  });

  it('query returns the operation result without writing', () => {
    mutate(store, tasks => addTasks(tasks, ['a', 'b']));
    const before = readFileSync(store.filePath, 'utf8');

    expect(query(store, tasks => tasks.slice(1)).map(t => t.description)).toEqual(['b']);
    expect(readFileSync(store.filePath, 'utf8')).toBe(before);
  });
});
