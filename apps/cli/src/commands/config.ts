import { Command } from 'commander';
import {
  getFirstWeekday, setFirstWeekday, getDefaultCategory, setDefaultCategory,
  isValidCategoryName, WeekdayName,
} from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { parseWeekdayArg, $try } from '../helpers.js';

export function createConfigCommand(ctx: CliContext): Command {
  const configCommand = new Command('config')
    .description('Show or change settings')
    .action(() => $try(() => {
      out.info(`first-weekday  ${WeekdayName[getFirstWeekday(ctx.db)]}`);
      out.info(`category       ${getDefaultCategory(ctx.db) ?? '(none)'}`);
    }));

  configCommand.addCommand(
    new Command('first-weekday')
      .description('Set the day weeks start on in stats (e.g. mon, sun)')
      .argument('<weekday>', 'Weekday name or number, 1 = Sunday')
      .action((value: string) => $try(() => {
        const weekday = parseWeekdayArg(value);
        if (weekday === null) throw new Error(`Invalid weekday: "${value}"`);
        setFirstWeekday(ctx.db, weekday);
        out.success(`Weeks now start on ${WeekdayName[weekday]}`);
      })),
  );

  configCommand.addCommand(
    new Command('category')
      .description('Set the category given to new tasks (omit to clear)')
      .argument('[name]', 'Category name')
      .action((name: string | undefined) => $try(() => {
        if (name === undefined || name.trim() === '') {
          setDefaultCategory(ctx.db, null);
          out.success('Cleared the default category');
          return;
        }
        if (!isValidCategoryName(name)) throw new Error(`Invalid category name: "${name}"`);
        setDefaultCategory(ctx.db, name.trim());
        out.success(`New tasks go to '${name.trim()}'`);
      })),
  );

  return configCommand;
}
