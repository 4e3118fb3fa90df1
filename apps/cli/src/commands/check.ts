import { Command } from 'commander';
import { toggleCompletions } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { parseDateArg, $try } from '../helpers.js';

interface CheckOptions {
  date?: string;
}

export function createCheckCommand(ctx: CliContext): Command {
  return new Command('check')
    .description('Toggle completion of one or more tasks (today unless --date is given)')
    .argument('<taskIds...>', 'The id(s) of the task(s) to toggle')
    .option('-d, --date <date>', 'The occurrence day to toggle (e.g. yesterday, 2026-01-15)')
    .action((taskIds: string[], opts: CheckOptions) => $try(() => {
      const today = ctx.today();
      const day = opts.date !== undefined ? parseDateArg(opts.date, today) : today;
      const result = toggleCompletions(ctx.db, taskIds, day, { today, now: ctx.now() });
      out.printBatchResults(result);
    }));
}
