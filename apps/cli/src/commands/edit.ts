import { Command } from 'commander';
import { editTaskAt } from '@todo/core';
import type { EditTaskChanges } from '@todo/core';
import * as out from '../output.js';
import { resolveDataFile, parseIdArg, parsePriorityOrClearArg, collect, $try, CLEAR } from '../helpers.js';

interface EditOptions {
  description?: string;
  priority?: number | typeof CLEAR;
  due?: string;
  tag: string[];
}

export function createEditCommand(): Command {
  return new Command('edit')
    .description('Edit an existing task')
    .argument('<id>', 'Task ID to edit', parseIdArg)
    .option('-d, --description <text>', 'New description')
    .option('-p, --priority <level>', "New priority (1-5, or 'clear')", parsePriorityOrClearArg)
    .option('--due <date>', "New due date (or 'clear')")
    .option('-t, --tag <tag>', 'Add a tag, existing tags are kept (repeatable)', collect, [])
    .action((id: number, opts: EditOptions, cmd: Command) => $try(() => {
      const changes: EditTaskChanges = { tags: opts.tag };
      if (opts.description !== undefined) changes.description = opts.description;
      if (opts.priority !== undefined) changes.priority = opts.priority === CLEAR ? null : opts.priority;
      if (opts.due !== undefined) {
        changes.due = opts.due.trim().toLowerCase() === CLEAR ? null : opts.due;
      }

      out.printResult(editTaskAt(resolveDataFile(cmd), id, changes));
    }));
}
