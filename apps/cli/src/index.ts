#!/usr/bin/env node

import { Command } from 'commander';
import { CliContext } from './helpers.js';
import type { GlobalOptions } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createTodayCommand } from './commands/today.js';
import { createListCommand } from './commands/list.js';
import { createCheckCommand } from './commands/check.js';
import { createEditCommand } from './commands/edit.js';
import { createArchiveCommand, createRestoreCommand } from './commands/archive.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatsCommand } from './commands/stats.js';
import { createHistoryCommand } from './commands/history.js';
import { createYearCommand } from './commands/year.js';
import { createCategoriesCommand } from './commands/categories.js';
import { createConfigCommand } from './commands/config.js';

// Build the CLI program
const program = new Command()
  .name('cadence')
  .description('Recurring tasks, streaks and completion stats')
  .version('1.0.0')
  .option('--db <path>', 'Database file (defaults to $CADENCE_DB or the platform data directory)')
  .option('--today <date>', 'Pretend today is this day')
  .option('-v, --verbose', 'Print log entries');

const ctx = new CliContext(() => program.opts<GlobalOptions>());

// Runs again when the default action hands over to `today`
program.hook('preAction', () => {
  if (program.opts<GlobalOptions>().verbose) ctx.enableVerboseLogging();
});

// Register commands
program.addCommand(createAddCommand(ctx));
program.addCommand(createTodayCommand(ctx));
program.addCommand(createListCommand(ctx));
program.addCommand(createCheckCommand(ctx));
program.addCommand(createEditCommand(ctx));
program.addCommand(createArchiveCommand(ctx));
program.addCommand(createRestoreCommand(ctx));
program.addCommand(createDeleteCommand(ctx));
program.addCommand(createStatsCommand(ctx));
program.addCommand(createHistoryCommand(ctx));
program.addCommand(createYearCommand(ctx));
program.addCommand(createCategoriesCommand(ctx));
program.addCommand(createConfigCommand(ctx));

// Default action (no command): show today's list
program.action((_opts: unknown, cmd: Command) => {
  cmd.commands.find(c => c.name() === 'today')?.parse(process.argv.slice(0, 2));
});

program.parse();
