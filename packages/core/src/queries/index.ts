export { filterTasks } from './filter.js';
export type { TaskFilter } from './filter.js';
export { compareTasks, sortTasks } from './sort.js';
export { isOverdue, summarizeTasks } from './summary.js';
export type { TaskSummary } from './summary.js';
