/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { Priority } from '@tasklane/core';
import type { Tag, Task, ValidationDetails } from '@tasklane/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

export function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: number): string {
  switch (priority) {
    case Priority.Highest: return chalk.red.bold('!!!!');
    case Priority.High: return chalk.red('!!! ');
    case Priority.Medium: return chalk.yellow('!!  ');
    case Priority.Low: return chalk.blue('!   ');
    default: return chalk.dim('·   ');
  }
}

function startOfDay(d: Date): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

function formatMonthDay(d: Date): string {
  return d.toLocaleDateString('en-US', { month: 'short', day: 'numeric' });
}

/** Due label relative to `now`; completed tasks never show as overdue */
export function formatDueDate(dueDate: string, completed: boolean, now: Date = new Date()): string {
  const [y = 0, m = 1, d = 1] = dueDate.split('-').map(Number);
  const dueD = new Date(y, m - 1, d);

  if (completed) return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);

  const diff = Math.round((dueD.getTime() - startOfDay(now).getTime()) / 86400000);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  if (diff < 7) return chalk.dim(`  Due: ${dueD.toLocaleDateString('en-US', { weekday: 'long' })}`);
  return chalk.dim(`  Due: ${formatMonthDay(dueD)}`);
}

export function formatTags(tags: readonly Tag[]): string {
  if (tags.length === 0) return '';
  const formatted = tags.map(t => tagColor(t.name)(`#${t.name}`));
  return '  ' + formatted.join(' ');
}

export function formatTaskLine(task: Task, now: Date = new Date()): string {
  const id = chalk.bold(`(${task.id})`);
  const title = task.completed ? chalk.dim.strikethrough(task.title) : task.title;
  return `${id} ${formatCheckbox(task.completed)} ${formatPriority(task.priority)} ${title}`
    + formatDueDate(task.dueDate, task.completed, now)
    + formatTags(task.tags);
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

/** One line per failing field */
export function validationErrors(details: ValidationDetails): void {
  error('Validation failed:');
  for (const [field, message] of Object.entries(details)) {
    console.log(`  ${chalk.bold(field)}: ${message}`);
  }
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
