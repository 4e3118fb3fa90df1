import { Command } from 'commander';
import { softDeleteTasks, restoreTask } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

export function createArchiveCommand(ctx: CliContext): Command {
  return new Command('archive')
    .description('Archive tasks: they stop being due but keep their history')
    .argument('<taskIds...>', 'The id(s) of the task(s) to archive')
    .action((taskIds: string[]) => $try(() => {
      out.printBatchResults(softDeleteTasks(ctx.db, taskIds));
    }));
}

export function createRestoreCommand(ctx: CliContext): Command {
  return new Command('restore')
    .description('Restore an archived task')
    .argument('<taskId>', 'The id of the task to restore')
    .action((taskId: string) => $try(() => {
      out.printResult(restoreTask(ctx.db, taskId));
    }));
}
