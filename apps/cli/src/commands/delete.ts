import { Command } from 'commander';
import { deleteTasks } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete tasks and their completion history permanently')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(() => {
      out.printBatchResults(deleteTasks(ctx.db, taskIds));
    }));
}
