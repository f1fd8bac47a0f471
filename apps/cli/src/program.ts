import { Command } from 'commander';
import { createAddCommand } from './commands/add.js';
import { createListCommand, runList } from './commands/list.js';
import { createCompleteCommand } from './commands/complete.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';
import { createCompletionsCommand } from './completions.js';
import { $try } from './helpers.js';

export function createProgram(): Command {
  const program = new Command()
    .name('todo')
    .description('A fast, colorful personal task manager')
    .version('0.1.0')
    .option('--data-file <path>', 'Path to the data file (overrides TODO_DATA_FILE)');

  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createCompleteCommand());
  program.addCommand(createEditCommand());
  program.addCommand(createDeleteCommand());
  program.addCommand(createCompletionsCommand());

  // Default action (no command): show open tasks
  program.action((_opts: unknown, cmd: Command) => $try(() => runList(cmd, {})));

  return program;
}
