/**
 * chalk-based terminal output: status messages and task lines.
 */

import chalk from 'chalk';
import { differenceInCalendarDays, format, parseISO } from 'date-fns';
import { isOverdue } from '@todo/core';
import type { CoreError, Task, TaskResult, TaskSummary } from '@todo/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.cyan;
}

// --- Formatting functions ---

export function formatPriority(priority: number | null): string {
  if (priority == null) return '';
  const label = `P${priority}`;
  switch (priority) {
    case 1: return chalk.red.bold(label);
    case 2: return chalk.yellow.bold(label);
    case 3: return chalk.blue.bold(label);
    case 4: return chalk.green.bold(label);
    default: return chalk.cyan.bold(label);
  }
}

/** today / tomorrow / yesterday / in N days / N days ago, else yyyy-MM-dd */
export function formatRelativeDate(timestamp: string, now: Date = new Date()): string {
  const date = parseISO(timestamp);
  const diff = differenceInCalendarDays(date, now);

  if (diff === 0) return 'today';
  if (diff === 1) return 'tomorrow';
  if (diff === -1) return 'yesterday';
  if (diff >= 2 && diff <= 7) return `in ${diff} days`;
  if (diff <= -2 && diff >= -7) return `${-diff} days ago`;
  return format(date, 'yyyy-MM-dd');
}

export function formatDueDate(task: Task, now: Date = new Date()): string {
  if (!task.dueDate) return '';
  const label = `(due ${formatRelativeDate(task.dueDate, now)})`;
  if (isOverdue(task, now)) return chalk.red.bold(label);

  const days = differenceInCalendarDays(parseISO(task.dueDate), now);
  if (days === 0) return chalk.yellow.bold(label);
  if (days >= 1 && days <= 3) return chalk.yellow(label);
  return label;
}

export function formatTags(tags: readonly string[]): string {
  return tags.map(t => tagColor(t)(`#${t}`)).join(' ');
}

export function formatTaskLine(task: Task, now: Date = new Date()): string {
  const parts = [`[${chalk.cyan.bold(String(task.id))}]`];

  const priority = formatPriority(task.priority);
  if (priority) parts.push(priority);

  if (task.completed) {
    parts.push(chalk.strikethrough.dim(task.description));
  } else if (isOverdue(task, now)) {
    parts.push(`⚠ ${chalk.red.bold(task.description)}`);
  } else {
    parts.push(task.description);
  }

  const tags = formatTags(task.tags);
  if (tags) parts.push(tags);

  const due = formatDueDate(task, now);
  if (due) parts.push(due);

  if (task.completedAt) {
    parts.push(chalk.green.dim(`(completed ${formatRelativeDate(task.completedAt, now)})`));
  }

  return parts.join(' ');
}

export function formatSummary(shown: number, summary: TaskSummary): string {
  return `Showing ${shown} tasks. Total: ${summary.total}, Completed: ${summary.completed}, Overdue: ${summary.overdue}`;
}

/** Message lines for a core error; the switch covers every kind */
export function describeError(err: CoreError): string[] {
  switch (err.kind) {
    case 'validation':
      return err.hint ? [err.message, err.hint] : [err.message];
    case 'task-not-found':
      return [err.message, 'Run `todo list --completed` to see every task id'];
    case 'store':
      return err.reason === 'corrupt'
        ? [err.message, 'Fix or remove the file by hand; nothing was changed']
        : [err.message];
    default: {
      const unreachable: never = err;
      return [String(unreachable)];
    }
  }
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'no-change': info(result.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(`${chalk.green.bold('✓')} ${message}`);
}

export function error(message: string): void {
  console.error(`${chalk.red.bold('✗')} ${chalk.red(message)}`);
}

export function hint(message: string): void {
  console.error(`  ${chalk.dim(message)}`);
}

export function info(message: string): void {
  console.log(`${chalk.blue.bold('ℹ')} ${message}`);
}

export function debug(message: string): void {
  if (process.env['TODO_DEBUG']) {
    console.error(chalk.dim(`[debug] ${message}`));
  }
}
