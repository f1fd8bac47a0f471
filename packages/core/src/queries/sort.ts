import type { Task } from '../types/task.js';

function instant(timestamp: string): number {
  return Date.parse(timestamp);
}

/**
 * Display order:
 *   1. tasks with a due date before tasks without one
 *   2. earlier due date first
 *   3. lower priority number first, no priority last
 *   4. earlier creation first
 */
export function compareTasks(a: Task, b: Task): number {
  if (a.dueDate != null && b.dueDate != null) {
    const d = instant(a.dueDate) - instant(b.dueDate);
    if (d !== 0) return d;
  } else if (a.dueDate != null) {
    return -1;
  } else if (b.dueDate != null) {
    return 1;
  }

  if (a.priority != null && b.priority != null) {
    if (a.priority !== b.priority) return a.priority - b.priority;
  } else if (a.priority != null) {
    return -1;
  } else if (b.priority != null) {
    return 1;
  }

  return instant(a.createdAt) - instant(b.createdAt);
}

/** Stable sort into display order; returns a new array */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}
