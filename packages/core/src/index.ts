// Types
export type { TaskId, Timestamp, Task, Store } from './types/index.js';
export type { TaskResult, DateResult, DateParseError } from './types/index.js';
export { MIN_PRIORITY, MAX_PRIORITY, isValidPriority, isChanged } from './types/index.js';

// Errors
export {
  TodoError, ValidationError, TaskNotFoundError, StoreError, isCoreError, errorMessage,
} from './errors.js';
export type { CoreError, ValidationField, StoreErrorReason } from './errors.js';

// Parsers
export {
  resolveDate, chronoGrammar, formatTimestamp, endOfDayAt, extractInlineTags,
  TIMESTAMP_FORMAT, DATE_HINT,
} from './parsers/index.js';
export type { DateGrammar, InlineTags } from './parsers/index.js';

// Storage
export * from './storage/index.js';

// Queries
export * from './queries/index.js';

// Operations
export * from './operations/index.js';
