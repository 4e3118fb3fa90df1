import { Command } from 'commander';
import chalk from 'chalk';
import { getRecentHistory, getTaskById } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { parseDaysArg, $try } from '../helpers.js';

interface HistoryOptions {
  days?: string;
}

export function createHistoryCommand(ctx: CliContext): Command {
  return new Command('history')
    .description('Show recent completions grouped by day')
    .option('-n, --days <count>', 'How many days to look back', '7')
    .action((opts: HistoryOptions) => $try(() => {
      const today = ctx.today();
      const history = getRecentHistory(ctx.db, parseDaysArg(opts.days, 7), today);

      if (history.length === 0) {
        out.info('No completions in that period');
        return;
      }

      const titles = new Map<string, string>();
      const titleOf = (taskId: string): string => {
        let title = titles.get(taskId);
        if (title === undefined) {
          title = getTaskById(ctx.db, taskId)?.title ?? '?';
          titles.set(taskId, title);
        }
        return title;
      };

      for (const { day, completions } of history) {
        console.log(chalk.bold(out.formatDayLabel(day, today)) + chalk.dim(`  ${completions.length}`));
        for (const c of completions) {
          console.log(`  ${chalk.green('✓')} ${chalk.dim(`(${c.taskId})`)} ${out.truncate(titleOf(c.taskId), 50)}`);
        }
      }
    }));
}
