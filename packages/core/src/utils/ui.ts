/**
 * Terminal output for the store-router CLI: status lines, headers,
 * aligned labels, spinners, tables and number formatting.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import ora, { type Ora } from 'ora';

export type MessageStatus = 'success' | 'error' | 'warn' | 'info';

const STATUS_SYMBOLS: Record<MessageStatus, string> = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

const LABEL_WIDTH = 18;

const TABLE_STYLE = {
  'padding-left': 1,
  'padding-right': 1,
  head: ['cyan'],
  border: ['dim'],
};

/**
 * "<symbol> <msg>", as printed by the status helpers below
 */
export function formatStatus(status: MessageStatus, msg: string): string {
  return `${STATUS_SYMBOLS[status]} ${msg}`;
}

export function success(msg: string): void {
  console.log(formatStatus('success', msg));
}

export function error(msg: string): void {
  console.log(formatStatus('error', msg));
}

export function warn(msg: string): void {
  console.log(formatStatus('warn', msg));
}

export function info(msg: string): void {
  console.log(formatStatus('info', msg));
}

/**
 * Bold title over a dimmed rule at least 40 columns wide
 */
export function formatHeader(title: string): string {
  const rule = '─'.repeat(Math.max(40, title.length + 4));
  return `${chalk.bold(title)}\n${chalk.dim(rule)}`;
}

export function header(title: string): void {
  console.log(`\n${formatHeader(title)}`);
}

export function formatLabel(key: string, value: string): string {
  return `  ${chalk.dim(key.padEnd(LABEL_WIDTH))}${value}`;
}

export function label(key: string, value: string): void {
  console.log(formatLabel(key, value));
}

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: 'dots' });
}

/**
 * cli-table3 table with cyan headings and dimmed borders; style keys the
 * caller passes override these one by one
 */
export function createTable(options: Table.TableConstructorOptions = {}): Table.Table {
  return new Table({ ...options, style: { ...TABLE_STYLE, ...options.style } });
}

/**
 * 0.9 -> "90.0%"
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Accuracy colored against a threshold: green at or above, red below
 */
export function formatAccuracy(value: number, threshold?: number): string {
  const text = formatPercent(value);
  if (threshold === undefined) return text;
  return value >= threshold ? chalk.green(text) : chalk.red(text);
}

export function formatMs(value: number): string {
  return `${value.toFixed(2)}ms`;
}
