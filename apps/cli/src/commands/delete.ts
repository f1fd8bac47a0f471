import { Command } from 'commander';
import { deleteTaskAt } from '@todo/core';
import * as out from '../output.js';
import { resolveDataFile, parseIdArg, $try } from '../helpers.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<id>', 'Task ID to delete', parseIdArg)
    .action((id: number, _opts: unknown, cmd: Command) => $try(() => {
      out.printResult(deleteTaskAt(resolveDataFile(cmd), id));
    }));
}
