import { Command } from 'commander';
import { completeTaskAt } from '@todo/core';
import * as out from '../output.js';
import { resolveDataFile, parseIdArg, $try } from '../helpers.js';

export function createCompleteCommand(): Command {
  return new Command('complete')
    .description('Mark a task as complete')
    .argument('<id>', 'Task ID to complete', parseIdArg)
    .action((id: number, _opts: unknown, cmd: Command) => $try(() => {
      out.printResult(completeTaskAt(resolveDataFile(cmd), id));
    }));
}
