/**
 * Error taxonomy for the core. Every failure a caller can see is one of the
 * classes below; switch on `kind` to handle them exhaustively.
 */

import type { TaskId } from './types/task.js';

export abstract class TodoError extends Error {
  abstract readonly kind: 'validation' | 'task-not-found' | 'store';
}

export type ValidationField = 'description' | 'priority' | 'due' | 'tags';

/** Bad user input. Raised before anything is mutated. */
export class ValidationError extends TodoError {
  readonly kind = 'validation';

  constructor(
    readonly field: ValidationField,
    message: string,
    readonly hint: string | null = null,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TaskNotFoundError extends TodoError {
  readonly kind = 'task-not-found';

  constructor(readonly taskId: TaskId) {
    super(`Task not found with ID: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

export type StoreErrorReason = 'corrupt' | 'io';

export class StoreError extends TodoError {
  readonly kind = 'store';

  constructor(
    readonly reason: StoreErrorReason,
    readonly path: string,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(
      reason === 'corrupt'
        ? `Data file ${path} is corrupt: ${detail}`
        : `Could not access data file ${path}: ${detail}`,
      options,
    );
    this.name = 'StoreError';
  }
}

export type CoreError = ValidationError | TaskNotFoundError | StoreError;

export function isCoreError(err: unknown): err is CoreError {
  return err instanceof TodoError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
