/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { describeRule, formatDay, toDate, isError, successCount, anyFailed } from '@cadence/core';
import type { Day, RecurrenceRule, TaskResult, BatchResult, LogEntry, PixelDay } from '@cadence/core';

// --- Formatting functions ---

export function formatCheckbox(done: boolean): string {
  return done ? chalk.green('[x]') : chalk.gray('[ ]');
}

/** Rule label for task rows; one-time tasks get ONCE */
export function formatRule(rule: RecurrenceRule): string {
  const label = describeRule(rule);
  return label ? chalk.cyan(label) : chalk.dim('ONCE');
}

/** Whole percent, rounded down; '-' when there is no rate */
export function formatRate(rate: number | null): string {
  if (rate === null) return '-';
  return `${Math.floor(rate)}%`;
}

export function colorRate(rate: number | null): string {
  const text = formatRate(rate);
  if (rate === null) return chalk.dim(text);
  if (rate >= 80) return chalk.green(text);
  if (rate >= 50) return chalk.yellow(text);
  return chalk.red(text);
}

export function formatStreak(days: number): string {
  const text = `${days}d`;
  return days > 0 ? chalk.yellow(text) : chalk.dim(text);
}

/** Signed month-over-month change, or 'new' when last month had none */
export function formatChange(changePercent: number | null): string {
  if (changePercent === null) return chalk.dim('new');
  if (changePercent > 0) return chalk.green(`+${changePercent}%`);
  if (changePercent < 0) return chalk.red(`${changePercent}%`);
  return chalk.dim('0%');
}

/** "Today", "Yesterday", else e.g. "Mon, Jan 15" */
export function formatDayLabel(day: Day, today: Day): string {
  if (day === today) return 'Today';
  if (day === today - 1) return 'Yesterday';
  return toDate(day).toLocaleDateString('en-US', { weekday: 'short', month: 'short', day: 'numeric' });
}

export function formatStartDate(startDate: Day | null, today: Day): string {
  if (startDate === null || startDate <= today) return '';
  return chalk.dim(`  starts ${formatDay(startDate)}`);
}

export function formatCategory(category: string | null): string {
  return category ? chalk.magenta(`@${category}`) : '';
}

/** Horizontal bar scaled so that `max` fills `width` cells */
export function bar(count: number, max: number, width = 20): string {
  if (max <= 0 || count <= 0) return '';
  const cells = Math.max(1, Math.round((count / max) * width));
  return '█'.repeat(cells);
}

/** One cell of the year grid */
export function pixel(p: PixelDay, bestDay: number): string {
  if (p.isFuture) return chalk.dim('·');
  if (p.count === 0) return p.isToday ? chalk.underline('□') : chalk.gray('□');
  const strong = bestDay > 1 && p.count * 2 > bestDay;
  const cell = strong ? chalk.green.bold('■') : chalk.green('■');
  return p.isToday ? chalk.underline(cell) : cell;
}

export function formatLogEntry(entry: LogEntry): string {
  const line = `[${entry.scope}] ${entry.message}`;
  switch (entry.level) {
    case 'warn': return chalk.yellow(line);
    case 'error': return chalk.red(line);
    default: return chalk.dim(line);
  }
}

// --- Result output ---

function showResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'no-change': info(result.message); break;
    case 'error': error(result.message); break;
  }
}

/** Print a result; failures mark the process as failed */
export function printResult(result: TaskResult): void {
  showResult(result);
  if (isError(result)) process.exitCode = 1;
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    showResult(result);
  }
  if (batch.results.length > 1) {
    console.log(chalk.dim(`${successCount(batch)} of ${batch.results.length} succeeded`));
  }
  if (anyFailed(batch)) process.exitCode = 1;
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
