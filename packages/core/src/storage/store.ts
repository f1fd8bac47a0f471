/**
 * Load/save of the task store. Each command does one full
 * load -> mutate -> save cycle; the file is the only source of truth.
 *
 * Saves go through a temp file in the same directory followed by a rename,
 * so a concurrent reader sees either the old file or the new one. Two
 * concurrent writers still race: the later save wins.
 */

import { copyFileSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { Store, Task, TaskId } from '../types/task.js';
import { StoreError, errorMessage } from '../errors.js';
import { parseStore, serializeStore } from './store-schema.js';

export function emptyStore(): Store {
  return { tasks: [], nextId: 1 };
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Keep a copy of an unreadable store next to it before reporting it */
function backupCorruptFile(path: string): string {
  const backupPath = `${path}.backup`;
  try {
    copyFileSync(path, backupPath);
    return `A copy was saved to ${backupPath}`;
  } catch (err: unknown) {
    return `Could not save a copy to ${backupPath}: ${errorMessage(err)}`;
  }
}

/**
 * Read the store at `path`. A missing or blank file is an empty store;
 * anything unparseable is reported as corrupt and never overwritten here.
 */
export function loadStore(path: string): Store {
  let content: string;
  try {
    content = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') return emptyStore();
    throw new StoreError('io', path, errorMessage(err), { cause: err });
  }

  if (!content.trim()) return emptyStore();

  const result = parseStore(content);
  if (result.type === 'error') {
    throw new StoreError('corrupt', path, `${result.detail}. ${backupCorruptFile(path)}`);
  }
  return result.store;
}

/** Write the full store to `path` via temp file + rename */
export function saveStore(store: Store, path: string): void {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

  let dirReady = false;
  try {
    mkdirSync(dir, { recursive: true });
    dirReady = true;
    writeFileSync(tmpPath, serializeStore(store), { encoding: 'utf8', flag: 'wx' });
    renameSync(tmpPath, path);
  } catch (err: unknown) {
    // A failed write may still have created the temp file
    if (dirReady) rmSync(tmpPath, { force: true });
    throw new StoreError('io', path, errorMessage(err), { cause: err });
  }
}

/** Hand out the next id. Call exactly once per created task. */
export function nextIdentifier(store: Store): TaskId {
  const id = store.nextId;
  store.nextId += 1;
  return id;
}

export function findTask(store: Store, id: TaskId): Task | undefined {
  return store.tasks.find(t => t.id === id);
}

export function findTaskIndex(store: Store, id: TaskId): number {
  return store.tasks.findIndex(t => t.id === id);
}
