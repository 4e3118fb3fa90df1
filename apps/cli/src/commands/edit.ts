import { Command } from 'commander';
import type { TaskChanges } from '@cadence/core';
import { updateTask } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { parseRuleArg, parseDateArg, $try } from '../helpers.js';

interface EditOptions {
  title?: string;
  category?: string;
  rule?: string;
  /** commander's --no-start negation sets this to false */
  start?: string | false;
  reactivate?: boolean;
}

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change a task')
    .argument('<taskId>', 'The id of the task to edit')
    .option('-t, --title <title>', 'New title')
    .option('-c, --category <name>', 'New category (empty string clears it)')
    .option('-r, --rule <rule>', 'New recurrence: none, daily, weekly:... or monthly:...')
    .option('-s, --start <date>', 'New start date')
    .option('--no-start', 'Clear the start date')
    .option('--reactivate', 'Clear a one-time task\'s completions so it is due again')
    .action((taskId: string, opts: EditOptions) => $try(() => {
      const today = ctx.today();
      const changes: TaskChanges = {
        ...(opts.title !== undefined ? { title: opts.title } : {}),
        ...(opts.category !== undefined ? { category: opts.category } : {}),
        ...(opts.rule !== undefined ? { rule: parseRuleArg(opts.rule) } : {}),
        ...(opts.start === false ? { startDate: null } : {}),
        ...(typeof opts.start === 'string' ? { startDate: parseDateArg(opts.start, today) } : {}),
        ...(opts.reactivate ? { reactivate: true } : {}),
      };
      out.printResult(updateTask(ctx.db, taskId, changes, today));
    }));
}
