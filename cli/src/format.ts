/**
 * Output formatting utilities for CLI
 */

import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';
import { formatCurrency } from '@supportdesk/shared';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function money(amount: number): string {
  return formatCurrency(amount);
}

export function statusColor(status: string): string {
  switch (status) {
    case 'delivered':
    case 'resolved':
    case 'processed':
    case 'connected':
      return chalk.green(status);
    case 'shipped':
    case 'processing':
    case 'in_progress':
    case 'approved':
      return chalk.blue(status);
    case 'pending':
    case 'open':
      return chalk.yellow(status);
    case 'cancelled':
    case 'rejected':
    case 'error':
      return chalk.red(status);
    default:
      return status;
  }
}

export function priorityColor(priority: string): string {
  if (priority === 'urgent') return chalk.red.bold(priority);
  if (priority === 'high') return chalk.red(priority);
  if (priority === 'medium') return chalk.yellow(priority);
  return chalk.dim(priority);
}

/** Visible width, ignoring colour codes */
function width(text: string): number {
  return stripVTControlCharacters(text).length;
}

function pad(text: string, size: number): string {
  return text + ' '.repeat(Math.max(0, size - width(text)));
}

/**
 * Lay rows out as aligned columns: header, rule, one line per row.
 * Column order follows `columns`, or the keys of the first row.
 */
export function renderTable(rows: Record<string, unknown>[], columns?: string[]): string[] {
  if (rows.length === 0) return [];

  const cols = columns || Object.keys(rows[0]);
  const cells = rows.map((r) => cols.map((c) => String(r[c] ?? '')));
  const widths = cols.map((c, i) => Math.max(c.length, ...cells.map((row) => width(row[i]))));

  return [
    cols.map((c, i) => pad(c, widths[i])).join('  ').trimEnd(),
    widths.map((w) => '─'.repeat(w)).join('──'),
    ...cells.map((row) => row.map((cell, i) => pad(cell, widths[i])).join('  ').trimEnd()),
  ];
}

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  const lines = renderTable(rows, columns);
  if (lines.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const [header, rule, ...body] = lines;
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${rule}`));
  for (const line of body) {
    console.log(`  ${line}`);
  }
}

export interface ToolCallLine {
  tool: string;
  arguments: Record<string, unknown>;
  result: { success: true; message: string } | { success: false; error: string };
}

/** One line per tool call, as shown under a chat reply */
export function describeToolCall(call: ToolCallLine): string {
  const outcome = call.result.success ? call.result.message : `failed: ${call.result.error}`;
  return `${call.tool}(${JSON.stringify(call.arguments)}) -> ${outcome}`;
}
