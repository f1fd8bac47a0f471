import { Command } from 'commander';
import { addTaskAt, extractInlineTags } from '@todo/core';
import * as out from '../output.js';
import { resolveDataFile, parsePriorityArg, collect, $try } from '../helpers.js';

interface AddOptions {
  priority?: number;
  due?: string;
  tag: string[];
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description...>', 'Task description (words like @home become tags)')
    .option('-p, --priority <level>', 'Priority (1-5, 1 = highest)', parsePriorityArg)
    .option('-d, --due <date>', 'Due date (YYYY-MM-DD, today, tomorrow, friday, in 3 days, ...)')
    .option('-t, --tag <tag>', 'Tag for the task (repeatable)', collect, [])
    .action((words: string[], opts: AddOptions, cmd: Command) => $try(() => {
      const path = resolveDataFile(cmd);
      const inline = extractInlineTags(words.join(' '));

      const result = addTaskAt(path, {
        description: inline.description,
        priority: opts.priority ?? null,
        due: opts.due ?? null,
        tags: [...opts.tag, ...inline.tags],
      });

      out.info(result.message);
      out.success('Task added successfully');
    }));
}
