/**
 * CLI helpers: argument parsing, data file resolution, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import {
  resolveDataFilePath, getDefaultPathInputs, isCoreError, errorMessage,
} from '@todo/core';
import * as out from './output.js';

const INTEGER_RE = /^-?\d+$/;

/** Parse a task id argument */
export function parseIdArg(value: string): number {
  const id = Number(value.trim());
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(id)) {
    throw new InvalidArgumentError('Task ID must be a non-negative integer.');
  }
  return id;
}

/** Parse a priority option into an integer. Range checks happen in the core. */
export function parsePriorityArg(value: string): number {
  if (!INTEGER_RE.test(value.trim())) {
    throw new InvalidArgumentError('Priority must be an integer from 1 (highest) to 5 (lowest).');
  }
  return Number(value.trim());
}

export const CLEAR = 'clear';

/** Like parsePriorityArg, but 'clear' yields the CLEAR marker (commander maps a null result to '') */
export function parsePriorityOrClearArg(value: string): number | typeof CLEAR {
  return value.trim().toLowerCase() === CLEAR ? CLEAR : parsePriorityArg(value);
}

/** Accumulator for repeatable options (-t a -t b) */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Resolve the data file from --data-file, TODO_DATA_FILE and platform defaults */
export function resolveDataFile(cmd: Command): string {
  const g = cmd.optsWithGlobals<{ dataFile?: string }>();
  const path = resolveDataFilePath(getDefaultPathInputs(g.dataFile));
  out.debug(`data file: ${path}`);
  return path;
}

/**
 * Run a command action, reporting any error and setting a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (isCoreError(err)) {
      const [message, ...hints] = out.describeError(err);
      out.error(message ?? err.message);
      for (const h of hints) out.hint(h);
    } else {
      out.error(errorMessage(err));
    }
    process.exitCode = 1;
  }
}
