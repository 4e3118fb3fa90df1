import { Command } from 'commander';
import chalk from 'chalk';
import { getTasksWithCompletions, yearOf } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

const MONTH_LABELS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function createYearCommand(ctx: CliContext): Command {
  return new Command('year')
    .description('Year in pixels: one cell per day, filled when anything was completed')
    .argument('[year]', 'Calendar year (defaults to the current one)')
    .action((yearArg: string | undefined) => $try(() => {
      const stats = ctx.stats();
      const year = yearArg !== undefined ? Number(yearArg) : yearOf(stats.today());
      if (!Number.isInteger(year) || year < 1970 || year > 9999) {
        throw new Error(`Invalid year: "${yearArg}"`);
      }

      const pixels = stats.yearInPixels(getTasksWithCompletions(ctx.db, { includeInactive: true }), year);

      console.log(chalk.bold(String(pixels.year)));
      pixels.months.forEach((row, i) => {
        console.log(`${MONTH_LABELS[i]} ${row.map(p => out.pixel(p, pixels.bestDay)).join('')}`);
      });
      console.log();
      console.log(`${pixels.totalCompletions} completion(s) on ${pixels.activeDays} day(s), best day ${pixels.bestDay}, longest streak ${pixels.longestStreak}d`);
    }));
}
