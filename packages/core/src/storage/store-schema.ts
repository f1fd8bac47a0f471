/**
 * On-disk representation of the store (snake_case JSON) and the codec
 * between it and the in-memory Store. Schema validation uses zod; on top of
 * it the store-level invariants (unique ids, next_id above every id,
 * completed_at present iff completed) are checked.
 */

import { z } from 'zod';
import type { Store, Task } from '../types/task.js';
import { MIN_PRIORITY, MAX_PRIORITY } from '../types/priority.js';

const timestampSchema = z.string().refine(s => !Number.isNaN(Date.parse(s)), {
  message: 'Invalid ISO-8601 timestamp',
});

const taskRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  description: z.string().min(1),
  priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY).nullish(),
  due_date: timestampSchema.nullish(),
  tags: z.array(z.string().min(1)).default([]),
  completed: z.boolean(),
  created_at: timestampSchema,
  completed_at: timestampSchema.nullish(),
});

const storeRecordSchema = z.object({
  tasks: z.array(taskRecordSchema),
  next_id: z.number().int().positive(),
}).superRefine((store, ctx) => {
  const seen = new Set<number>();
  store.tasks.forEach((task, i) => {
    if (seen.has(task.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tasks', i, 'id'], message: `Duplicate task id ${task.id}` });
    }
    seen.add(task.id);

    if (task.id >= store.next_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['next_id'],
        message: `next_id ${store.next_id} must be greater than task id ${task.id}`,
      });
    }

    if (task.completed !== (task.completed_at != null)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tasks', i, 'completed_at'],
        message: task.completed ? 'Completed task has no completed_at' : 'Open task has a completed_at',
      });
    }
  });
});

type TaskRecord = z.input<typeof taskRecordSchema>;
type ParsedTaskRecord = z.output<typeof taskRecordSchema>;

export type ParseStoreResult =
  | { readonly type: 'success'; readonly store: Store }
  | { readonly type: 'error'; readonly detail: string };

function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    description: task.description,
    priority: task.priority,
    due_date: task.dueDate,
    tags: [...task.tags],
    completed: task.completed,
    created_at: task.createdAt,
    completed_at: task.completedAt,
  };
}

function fromRecord(record: ParsedTaskRecord): Task {
  return {
    id: record.id,
    description: record.description,
    priority: record.priority ?? null,
    dueDate: record.due_date ?? null,
    tags: record.tags,
    completed: record.completed,
    createdAt: record.created_at,
    completedAt: record.completed_at ?? null,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Serialize the full store as pretty-printed JSON with a trailing newline */
export function serializeStore(store: Store): string {
  const record = {
    tasks: store.tasks.map(toRecord),
    next_id: store.nextId,
  };
  return JSON.stringify(record, null, 2) + '\n';
}

/** Parse and validate a store file's contents */
export function parseStore(text: string): ParseStoreResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    return { type: 'error', detail: err instanceof Error ? err.message : String(err) };
  }

  const parsed = storeRecordSchema.safeParse(json);
  if (!parsed.success) {
    return { type: 'error', detail: formatIssues(parsed.error) };
  }

  return {
    type: 'success',
    store: { tasks: parsed.data.tasks.map(fromRecord), nextId: parsed.data.next_id },
  };
}
