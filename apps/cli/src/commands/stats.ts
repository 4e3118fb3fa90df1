import { Command } from 'commander';
import chalk from 'chalk';
import type { RollupStats, TaskStats, TaskWithCompletions } from '@cadence/core';
import { getTasksWithCompletions, getTaskWithCompletions, formatDay, describeRule } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

interface StatsOptions {
  category?: string;
}

export function createStatsCommand(ctx: CliContext): Command {
  return new Command('stats')
    .description('Streaks, completion rates and trends for a task, a category, or everything')
    .argument('[taskId]', 'Show a single task')
    .option('-c, --category <name>', 'Only tasks in this category')
    .action((taskId: string | undefined, opts: StatsOptions) => $try(() => {
      const stats = ctx.stats();

      if (taskId !== undefined) {
        const task = getTaskWithCompletions(ctx.db, taskId);
        if (!task) {
          out.error(`Could not find task with id ${taskId}`);
          process.exitCode = 1;
          return;
        }
        printTaskStats(task, stats);
        printTrends([task], stats);
        return;
      }

      const tasks = getTasksWithCompletions(ctx.db, opts.category !== undefined ? { category: opts.category } : {});
      if (tasks.length === 0) {
        out.info('No tasks to report on');
        return;
      }

      console.log(chalk.bold.underline(opts.category ? `Category: ${opts.category}` : 'All tasks'));
      printRollup(stats.rollup(tasks));

      if (opts.category === undefined) {
        console.log();
        console.log(chalk.bold.underline('By category'));
        for (const group of stats.categoryRollups(tasks)) {
          const name = group.category ?? chalk.dim('(none)');
          console.log(`  ${name}  ${group.taskCount} task(s)  streak ${out.formatStreak(group.currentStreak)}  best ${group.bestStreak}d  rate ${out.colorRate(group.completionRate)}`);
        }
      }

      printTrends(tasks, stats);
    }));
}

function printTaskStats(task: TaskWithCompletions, stats: TaskStats): void {
  const s = stats.summarize(task);
  const rule = describeRule(task.rule) || 'ONCE';

  console.log(`${chalk.bold(task.title)} ${chalk.dim(`(${task.id})`)}  ${chalk.cyan(rule)}`);
  console.log(`  Current streak:   ${out.formatStreak(s.currentStreak)}`);
  console.log(`  Best streak:      ${s.bestStreak}d`);
  if (task.rule.kind !== 'none' && task.rule.kind !== 'daily') {
    console.log(`  Best run:         ${s.bestScheduledRun} occurrence(s) in a row`);
  }
  console.log(`  Completion rate:  ${out.colorRate(s.completionRate)}`);
  console.log(`  Completed days:   ${s.completionDays}`);
  if (s.firstCompletion !== null && s.lastCompletion !== null) {
    console.log(`  First / last:     ${formatDay(s.firstCompletion)} / ${formatDay(s.lastCompletion)}`);
  }
  console.log(`  Due today:        ${s.dueToday ? (s.completedToday ? 'yes, done' : 'yes') : 'no'}`);
}

function printRollup(r: RollupStats): void {
  console.log(`  Tasks:            ${r.taskCount}`);
  console.log(`  Current streak:   ${out.formatStreak(r.currentStreak)}`);
  console.log(`  Best streak:      ${r.bestStreak}d`);
  console.log(`  Completion rate:  ${out.colorRate(r.completionRate)} (${r.completedOccurrences} of ${r.scheduledOccurrences} scheduled)`);
  console.log(`  Active days:      ${r.activeDays}`);
  console.log(`  Completions:      ${r.totalCompletions}`);
}

function printTrends(tasks: readonly TaskWithCompletions[], stats: TaskStats): void {
  const rhythm = stats.weeklyRhythm(tasks);
  const max = Math.max(0, ...rhythm.map(r => r.count));

  console.log();
  console.log(chalk.bold.underline('Weekly rhythm'));
  for (const r of rhythm) {
    console.log(`  ${r.label}  ${chalk.green(out.bar(r.count, max))} ${chalk.dim(String(r.count))}`);
  }

  const trend = stats.monthlyTrend(tasks);
  console.log();
  console.log(chalk.bold.underline('This month'));
  console.log(`  ${trend.thisMonth} completion(s), last month ${trend.lastMonth}  ${out.formatChange(trend.changePercent)}`);
}
