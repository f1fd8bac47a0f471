import { Command } from 'commander';
import { listTasksAt, summarizeTasks } from '@todo/core';
import * as out from '../output.js';
import { resolveDataFile, $try } from '../helpers.js';

export interface ListOptions {
  tag?: string;
  excludeTag?: string;
  completed?: boolean;
}

/** Shared by `list` and the bare `todo` invocation */
export function runList(cmd: Command, opts: ListOptions, now: Date = new Date()): void {
  const path = resolveDataFile(cmd);
  const { tasks, all } = listTasksAt(path, {
    includeTag: opts.tag ?? null,
    excludeTag: opts.excludeTag ?? null,
    showCompleted: opts.completed ?? false,
  });

  if (tasks.length === 0) {
    out.info('No tasks found matching the criteria');
    return;
  }

  for (const task of tasks) {
    console.log(out.formatTaskLine(task, now));
  }

  console.log();
  out.info(out.formatSummary(tasks.length, summarizeTasks(all, now)));
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks')
    .option('-t, --tag <tag>', 'Only tasks with this tag')
    .option('--exclude-tag <tag>', 'Hide tasks with this tag')
    .option('-c, --completed', 'Include completed tasks')
    .action((opts: ListOptions, cmd: Command) => $try(() => runList(cmd, opts)));
}
