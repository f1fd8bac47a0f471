import type { Task } from '../types/task.js';

export interface TaskSummary {
  total: number;
  completed: number;
  overdue: number;
}

/** Due strictly before `now` and still open */
export function isOverdue(task: Task, now: Date = new Date()): boolean {
  return !task.completed && task.dueDate != null && Date.parse(task.dueDate) < now.getTime();
}

export function summarizeTasks(tasks: readonly Task[], now: Date = new Date()): TaskSummary {
  return {
    total: tasks.length,
    completed: tasks.filter(t => t.completed).length,
    overdue: tasks.filter(t => isOverdue(t, now)).length,
  };
}
