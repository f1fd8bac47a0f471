import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatTimestamp, StoreError } from '@todo/core';
import type { Task } from '@todo/core';
import {
  formatTaskLine, formatRelativeDate, formatPriority, formatSummary, describeError,
} from '../src/output.js';

// Tuesday Jul 8 2025, 10:30 local
const now = new Date(2025, 6, 8, 10, 30);

function task(overrides: Partial<Task> = {}): Task {
  return {
    id: 3,
    description: 'Write report',
    priority: null,
    dueDate: null,
    tags: [],
    completed: false,
    createdAt: formatTimestamp(new Date(2025, 6, 1, 9, 0)),
    completedAt: null,
    ...overrides,
  };
}

beforeAll(() => {
  chalk.level = 0;
});

describe('formatRelativeDate', () => {
  it.each([
    [new Date(2025, 6, 8, 23, 59, 59), 'today'],
    [new Date(2025, 6, 9, 23, 59, 59), 'tomorrow'],
    [new Date(2025, 6, 7, 8, 0), 'yesterday'],
    [new Date(2025, 6, 12, 0, 0), 'in 4 days'],
    [new Date(2025, 6, 5, 0, 0), '3 days ago'],
    [new Date(2025, 7, 30, 12, 0), '2025-08-30'],
  ])('formats %s', (date, expected) => {
    expect(formatRelativeDate(formatTimestamp(date), now)).toBe(expected);
  });
});

describe('formatPriority', () => {
  it('labels priorities and omits missing ones', () => {
    expect(formatPriority(2)).toBe('P2');
    expect(formatPriority(null)).toBe('');
  });
});

describe('formatTaskLine', () => {
  it('shows id, priority, tags and due date', () => {
    const line = formatTaskLine(task({
      priority: 2,
      tags: ['work', 'q3'],
      dueDate: formatTimestamp(new Date(2025, 6, 9, 23, 59, 59)),
    }), now);
    expect(line).toBe('[3] P2 Write report #work #q3 (due tomorrow)');
  });

  it('flags overdue tasks', () => {
    const line = formatTaskLine(task({ dueDate: formatTimestamp(new Date(2025, 6, 7, 23, 59, 59)) }), now);
    expect(line).toBe('[3] ⚠ Write report (due yesterday)');
  });

  it('shows when a task was completed', () => {
    const line = formatTaskLine(task({
      completed: true,
      completedAt: formatTimestamp(new Date(2025, 6, 8, 9, 0)),
    }), now);
    expect(line).toBe('[3] Write report (completed today)');
  });
});

describe('formatSummary', () => {
  it('reports counts', () => {
    expect(formatSummary(2, { total: 5, completed: 2, overdue: 1 }))
      .toBe('Showing 2 tasks. Total: 5, Completed: 2, Overdue: 1');
  });
});

describe('describeError', () => {
  it('adds guidance for corrupt stores', () => {
    const err = new StoreError('corrupt', '/tmp/t.json', 'Unexpected end of JSON input');
    expect(describeError(err)).toEqual([
      'Data file /tmp/t.json is corrupt: Unexpected end of JSON input',
      'Fix or remove the file by hand; nothing was changed',
    ]);
  });

  it('passes io errors through', () => {
    const err = new StoreError('io', '/tmp/t.json', 'EACCES');
    expect(describeError(err)).toEqual(['Could not access data file /tmp/t.json: EACCES']);
  });
});
