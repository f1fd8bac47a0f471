/**
 * One command = one transaction: load the whole store, apply a single
 * operation, write the whole store back. Nothing is saved when the
 * operation throws or reports no change.
 */

import type { Store, Task, TaskId } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import { isChanged } from '../types/results.js';
import { loadStore, saveStore } from '../storage/store.js';
import { filterTasks } from '../queries/filter.js';
import type { TaskFilter } from '../queries/filter.js';
import { sortTasks } from '../queries/sort.js';
import {
  addTask, editTask, completeTask, deleteTask,
} from './task-operations.js';
import type { AddTaskInput, EditTaskChanges } from './task-operations.js';

export function runTransaction(path: string, operation: (store: Store) => TaskResult): TaskResult {
  const store = loadStore(path);
  const result = operation(store);
  if (isChanged(result)) {
    saveStore(store, path);
  }
  return result;
}

export function addTaskAt(path: string, input: AddTaskInput, now: Date = new Date()): TaskResult {
  return runTransaction(path, store => addTask(store, input, now));
}

export function editTaskAt(
  path: string,
  id: TaskId,
  changes: EditTaskChanges,
  now: Date = new Date(),
): TaskResult {
  return runTransaction(path, store => editTask(store, id, changes, now));
}

export function completeTaskAt(path: string, id: TaskId, now: Date = new Date()): TaskResult {
  return runTransaction(path, store => completeTask(store, id, now));
}

export function deleteTaskAt(path: string, id: TaskId): TaskResult {
  return runTransaction(path, store => deleteTask(store, id));
}

/** Read-only: load, filter, sort */
export function listTasksAt(path: string, filter: TaskFilter = {}): { tasks: Task[]; all: Task[] } {
  const all = loadStore(path).tasks;
  return { tasks: sortTasks(filterTasks(all, filter)), all };
}
