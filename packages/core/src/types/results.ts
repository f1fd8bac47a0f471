import type { Task, Timestamp } from './task.js';

/** Outcome of a lifecycle operation. Failures are thrown as typed errors. */
export type TaskResult =
  | { readonly type: 'success'; readonly task: Task; readonly message: string }
  | { readonly type: 'no-change'; readonly task: Task; readonly message: string };

export interface DateParseError {
  readonly kind: 'unparseable';
  readonly input: string;
}

export type DateResult =
  | { readonly type: 'success'; readonly date: Timestamp }
  | { readonly type: 'error'; readonly error: DateParseError };

export function isChanged(r: TaskResult): boolean {
  return r.type === 'success';
}
