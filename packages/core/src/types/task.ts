export type TaskId = number;

/** ISO-8601 timestamp in local time with its UTC offset, e.g. 2025-07-15T23:59:59.000+02:00 */
export type Timestamp = string;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly priority: number | null; // 1 (highest) .. 5
  readonly dueDate: Timestamp | null;
  readonly tags: readonly string[];
  readonly completed: boolean;
  readonly createdAt: Timestamp;
  readonly completedAt: Timestamp | null;
}

/**
 * The whole persisted collection. Loaded once per command, mutated by a
 * single operation and written back in full.
 */
export interface Store {
  tasks: Task[];
  nextId: TaskId;
}
