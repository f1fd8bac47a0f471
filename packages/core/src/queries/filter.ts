import type { Task } from '../types/task.js';

export interface TaskFilter {
  includeTag?: string | null;
  excludeTag?: string | null;
  showCompleted?: boolean;
}

/** Select tasks matching every given criterion. Tag matches are exact and case-sensitive. */
export function filterTasks(tasks: readonly Task[], filter: TaskFilter = {}): Task[] {
  const { includeTag, excludeTag, showCompleted = false } = filter;

  return tasks.filter(t => {
    if (!showCompleted && t.completed) return false;
    if (includeTag != null && !t.tags.includes(includeTag)) return false;
    if (excludeTag != null && t.tags.includes(excludeTag)) return false;
    return true;
  });
}
