export type { TaskId, Timestamp, Task, Store } from './task.js';
export { MIN_PRIORITY, MAX_PRIORITY, isValidPriority } from './priority.js';
export type { TaskResult, DateResult, DateParseError } from './results.js';
export { isChanged } from './results.js';
