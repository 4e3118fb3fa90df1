import { Command } from 'commander';
import chalk from 'chalk';
import type { TaskWithCompletions, TaskStats, Day } from '@cadence/core';
import { getTasksWithCompletions } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

interface ListOptions {
  category?: string;
  inactive?: boolean;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List all tasks with their rule, streak and completion rate')
    .option('-c, --category <name>', 'Only tasks in this category')
    .option('--inactive', 'Include archived tasks')
    .action((opts: ListOptions) => $try(() => {
      const stats = ctx.stats();
      const tasks = getTasksWithCompletions(ctx.db, {
        ...(opts.category !== undefined ? { category: opts.category } : {}),
        includeInactive: opts.inactive ?? false,
      });

      if (tasks.length === 0) {
        out.info(opts.category
          ? `No tasks in category '${opts.category}'`
          : 'No tasks saved yet... use the add command to create one');
        return;
      }

      for (const task of tasks) {
        console.log(formatTaskRow(task, stats, stats.today()));
      }
    }));
}

export function formatTaskRow(task: TaskWithCompletions, stats: TaskStats, today: Day): string {
  const id = chalk.dim(`(${task.id})`);
  const checkbox = out.formatCheckbox(stats.isCompletedToday(task));
  const title = task.active ? chalk.bold(task.title) : chalk.dim.strikethrough(task.title);
  const category = task.category ? `  ${out.formatCategory(task.category)}` : '';
  const start = out.formatStartDate(task.startDate, today);

  let metrics: string;
  if (task.rule.kind === 'none') {
    metrics = stats.occurrenceDays(task).size > 0 ? chalk.dim('done') : '';
  } else {
    metrics = `${out.formatStreak(stats.currentStreak(task))} ${out.colorRate(stats.completionRate(task))}`;
  }

  return `${id} ${checkbox} ${title}  ${out.formatRule(task.rule)}${category}${start}  ${metrics}`.trimEnd();
}
