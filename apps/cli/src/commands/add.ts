import { Command } from 'commander';
import { addTask, describeRule } from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { parseRuleArg, parseDateArg, resolveCategoryForAdd, $try } from '../helpers.js';

interface AddOptions {
  category?: string;
  rule?: string;
  start?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-c, --category <name>', 'Category label (defaults to the configured default category)')
    .option('-r, --rule <rule>', 'Recurrence: none, daily, weekly:mon,wed,fri or monthly:1,15', 'none')
    .option('-s, --start <date>', 'Not due before this day (one-time and daily tasks only)')
    .action((title: string, opts: AddOptions) => $try(() => {
      const today = ctx.today();
      const rule = parseRuleArg(opts.rule ?? 'none');
      const startDate = opts.start !== undefined ? parseDateArg(opts.start, today) : null;

      if (startDate !== null && (rule.kind === 'weekly' || rule.kind === 'monthly')) {
        out.warning(`${describeRule(rule)} tasks ignore the start date`);
      }

      const result = addTask(ctx.db, {
        title,
        category: resolveCategoryForAdd(ctx.db, opts.category),
        rule,
        startDate,
      }, today);
      out.printResult(result);
    }));
}
