/**
 * CLI output — coloured messages, tables, JSON mode, quiet/verbose
 * filtering and spinners. Every command prints through here.
 */

import type { Severity } from '@logrelay/sdk';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

// ─── Mode ────────────────────────────────────────────────────────────────────

export interface OutputMode {
	json: boolean;
	quiet: boolean;
	verbose: boolean;
}

const mode: OutputMode = { json: false, quiet: false, verbose: false };

export function configureOutput(next: Partial<OutputMode>): void {
	Object.assign(mode, next);
}

export function isJsonMode(): boolean {
	return mode.json;
}

/** Human-readable lines are suppressed in JSON and quiet mode; errors only in JSON mode. */
function human(): boolean {
	return !mode.json && !mode.quiet;
}

// ─── Messages ────────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (human()) console.log(message);
}

export function success(message: string): void {
	if (human()) console.log(chalk.green(`  ✓ ${message}`));
}

export function warn(message: string): void {
	if (human()) console.warn(chalk.yellow(`  ! ${message}`));
}

export function error(message: string): void {
	if (!mode.json) console.error(chalk.red(`  ✗ ${message}`));
}

export function verbose(message: string): void {
	if (mode.verbose && human()) console.log(chalk.dim(`  … ${message}`));
}

export function heading(text: string): void {
	if (human()) console.log(chalk.bold(text));
}

export function subheading(text: string): void {
	if (human()) console.log(chalk.bold.dim(`\n  ${text}:`));
}

/** One indented `key: value` line, the key dimmed */
export function field(key: string, value: string): void {
	if (human()) console.log(`    ${chalk.dim(`${key}:`.padEnd(12))}${value}`);
}

const SEVERITY_COLORS: Readonly<Record<Severity, (text: string) => string>> = {
	debug: chalk.gray,
	info: chalk.cyan,
	warn: chalk.yellow,
	error: chalk.red,
	critical: chalk.bold.red,
};

/** A severity name coloured by how loud it is */
export function severity(level: Severity): string {
	return SEVERITY_COLORS[level](level);
}

/** One validation result line; failures still print in quiet mode */
export function check(subject: string, passed: boolean, detail: string): void {
	if (mode.json || (passed && mode.quiet)) return;
	const mark = passed ? chalk.green('✓') : chalk.red('✗');
	console.log(`${mark} ${subject} — ${detail}`);
}

// ─── JSON ────────────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface TableColumn {
	header: string;
	key: string;
}

/** Print rows under padded headers, or the rows themselves in JSON mode. */
export function table(columns: TableColumn[], rows: Record<string, string>[]): void {
	if (mode.json) {
		json(rows);
		return;
	}
	if (mode.quiet) return;

	const widths = columns.map(
		(col) => Math.max(col.header.length, ...rows.map((row) => (row[col.key] ?? '').length)) + 2,
	);
	const render = (cells: string[]): string =>
		cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('').trimEnd();

	console.log(chalk.dim(`  ${render(columns.map((col) => col.header))}`));
	for (const row of rows) {
		console.log(`  ${render(columns.map((col) => row[col.key] ?? ''))}`);
	}
}

// ─── Spinner ─────────────────────────────────────────────────────────────────

export function spinner(text: string): Ora {
	if (!human()) return ora({ text, isSilent: true });
	return ora({ text, color: 'cyan' }).start();
}
