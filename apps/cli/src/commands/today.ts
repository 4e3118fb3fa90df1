import { Command } from 'commander';
import chalk from 'chalk';
import { getTasksWithCompletions, formatDay } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

export function createTodayCommand(ctx: CliContext): Command {
  return new Command('today')
    .description("Show what is still due today")
    .action(() => $try(() => {
      const stats = ctx.stats();
      const today = stats.today();
      const summary = stats.todaySummary(getTasksWithCompletions(ctx.db));

      console.log(chalk.bold(`${out.formatDayLabel(today, today)} (${formatDay(today)})`));

      if (summary.totalCount === 0) {
        out.info('Nothing is due today');
        return;
      }

      for (const task of summary.remaining) {
        const streak = stats.currentStreak(task);
        const streakLabel = streak > 0 ? `  ${out.formatStreak(streak)}` : '';
        const category = task.category ? `  ${out.formatCategory(task.category)}` : '';
        console.log(`${chalk.dim(`(${task.id})`)} ${out.formatCheckbox(false)} ${chalk.bold(task.title)}  ${out.formatRule(task.rule)}${category}${streakLabel}`);
      }

      if (summary.remaining.length === 0) out.success('All done for today');
      console.log(chalk.dim(`${summary.completedCount} of ${summary.totalCount} completed`));
    }));
}
