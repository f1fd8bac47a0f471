/**
 * Lifecycle operations: add, edit, complete, delete.
 * Each works on an explicit Store value. All input is validated before the
 * store is touched, so a thrown error always leaves it unchanged.
 */

import type { Store, Task, TaskId, Timestamp } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import { isValidPriority, MIN_PRIORITY, MAX_PRIORITY } from '../types/priority.js';
import { ValidationError, TaskNotFoundError } from '../errors.js';
import { resolveDate, formatTimestamp, DATE_HINT } from '../parsers/date-parser.js';
import { nextIdentifier, findTaskIndex } from '../storage/store.js';

export interface AddTaskInput {
  description: string;
  priority?: number | null;
  due?: string | null;
  tags?: readonly string[];
}

/** Omitted fields are left alone. `null` clears priority or due date. Tags are added, never replaced. */
export interface EditTaskChanges {
  description?: string;
  priority?: number | null;
  due?: string | null;
  tags?: readonly string[];
}

function validateDescription(description: string): string {
  const trimmed = description.trim();
  if (!trimmed) {
    throw new ValidationError('description', 'Task description cannot be empty', 'Example: todo add "Buy milk"');
  }
  return trimmed;
}

function validatePriority(priority: number): number {
  if (!isValidPriority(priority)) {
    throw new ValidationError(
      'priority',
      `Invalid priority value: ${priority}. Priority must be between ${MIN_PRIORITY} and ${MAX_PRIORITY}`,
      'Example: --priority 1 (1 = highest, 5 = lowest)',
    );
  }
  return priority;
}

function resolveDue(expression: string, now: Date): Timestamp {
  const result = resolveDate(expression, now);
  if (result.type === 'error') {
    throw new ValidationError('due', `Unable to parse date: '${result.error.input}'`, DATE_HINT);
  }
  return result.date;
}

/** Trim tags, reject empty ones and collapse duplicates (first occurrence wins) */
export function normalizeTags(tags: readonly string[]): string[] {
  const result: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    if (!tag) {
      throw new ValidationError('tags', `Invalid tag: '${raw}'. Tags cannot be empty`, 'Example: --tag work');
    }
    if (!result.includes(tag)) result.push(tag);
  }
  return result;
}

function locate(store: Store, id: TaskId): { index: number; task: Task } {
  const index = findTaskIndex(store, id);
  const task = store.tasks[index];
  if (!task) throw new TaskNotFoundError(id);
  return { index, task };
}

export function addTask(store: Store, input: AddTaskInput, now: Date = new Date()): TaskResult {
  const description = validateDescription(input.description);
  const priority = input.priority != null ? validatePriority(input.priority) : null;
  const dueDate = input.due != null ? resolveDue(input.due, now) : null;
  const tags = normalizeTags(input.tags ?? []);

  const task: Task = {
    id: nextIdentifier(store),
    description,
    priority,
    dueDate,
    tags,
    completed: false,
    createdAt: formatTimestamp(now),
    completedAt: null,
  };
  store.tasks.push(task);

  return { type: 'success', task, message: `Created task with ID: ${task.id}` };
}

export function editTask(
  store: Store,
  id: TaskId,
  changes: EditTaskChanges,
  now: Date = new Date(),
): TaskResult {
  const { index, task } = locate(store, id);

  const description = changes.description !== undefined
    ? validateDescription(changes.description)
    : task.description;
  const priority = changes.priority !== undefined
    ? (changes.priority === null ? null : validatePriority(changes.priority))
    : task.priority;
  const dueDate = changes.due !== undefined
    ? (changes.due === null ? null : resolveDue(changes.due, now))
    : task.dueDate;
  const added = normalizeTags(changes.tags ?? []).filter(t => !task.tags.includes(t));

  if (
    description === task.description
    && priority === task.priority
    && dueDate === task.dueDate
    && added.length === 0
  ) {
    return { type: 'no-change', task, message: `Task ${id} is unchanged` };
  }

  const updated: Task = {
    ...task,
    description,
    priority,
    dueDate,
    tags: [...task.tags, ...added],
  };
  store.tasks[index] = updated;

  return { type: 'success', task: updated, message: `Task ${id} updated successfully` };
}

/** Open -> Completed. Completing twice keeps the first completedAt. */
export function completeTask(store: Store, id: TaskId, now: Date = new Date()): TaskResult {
  const { index, task } = locate(store, id);

  if (task.completed) {
    return { type: 'no-change', task, message: `Task ${id} is already completed` };
  }

  const updated: Task = { ...task, completed: true, completedAt: formatTimestamp(now) };
  store.tasks[index] = updated;

  return { type: 'success', task: updated, message: `Task ${id} marked as complete` };
}

export function deleteTask(store: Store, id: TaskId): TaskResult {
  const { index, task } = locate(store, id);
  store.tasks.splice(index, 1);
  return { type: 'success', task, message: `Task ${id} deleted successfully` };
}
