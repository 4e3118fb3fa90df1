import { Command } from 'commander';
import chalk from 'chalk';
import {
  getAllCategories, getCategoryNames, createCategory, deleteCategory,
  renameCategory, getDefaultCategory,
} from '@cadence/core';
import * as out from '../output.js';
import type { CliContext } from '../helpers.js';
import { $try } from '../helpers.js';

interface AddCategoryOptions {
  icon?: string;
  color?: string;
}

export function createCategoriesCommand(ctx: CliContext): Command {
  const categoriesCommand = new Command('categories')
    .description('Manage categories')
    .action(() => $try(() => {
      const names = getCategoryNames(ctx.db);
      if (names.length === 0) {
        out.info('No categories yet. Add one with: cadence categories add <name>');
        return;
      }

      const registered = new Map(getAllCategories(ctx.db).map(c => [c.name, c]));
      const defaultCategory = getDefaultCategory(ctx.db);
      for (const name of names) {
        const c = registered.get(name);
        const icon = c?.icon ? `${c.icon} ` : '';
        const color = c?.color ? chalk.hex(`#${c.color}`)('●') + ' ' : '';
        const label = name === defaultCategory ? chalk.bold(`${name} (default)`) : name;
        const unregistered = c ? '' : chalk.dim(' (label only)');
        console.log(`  ${color}${icon}${label}${unregistered}`);
      }
    }));

  categoriesCommand.addCommand(
    new Command('add')
      .description('Register a category')
      .argument('<name>', 'Category name')
      .option('-i, --icon <icon>', 'Icon or emoji')
      .option('--color <hex>', 'Color as hex, e.g. #3a7bd5')
      .action((name: string, opts: AddCategoryOptions) => $try(() => {
        out.printResult(createCategory(ctx.db, name, {
          icon: opts.icon ?? null,
          color: opts.color ?? null,
        }, ctx.now()));
      })),
  );

  categoriesCommand.addCommand(
    new Command('rm')
      .description('Remove a category (tasks keep their label)')
      .argument('<name>', 'Category name')
      .action((name: string) => $try(() => {
        out.printResult(deleteCategory(ctx.db, name));
      })),
  );

  categoriesCommand.addCommand(
    new Command('rename')
      .description('Rename a category and re-label its tasks')
      .argument('<oldName>', 'The current name')
      .argument('<newName>', 'The new name')
      .action((oldName: string, newName: string) => $try(() => {
        out.printResult(renameCategory(ctx.db, oldName, newName));
      })),
  );

  return categoriesCommand;
}
