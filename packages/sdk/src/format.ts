/**
 * Template formatting for log records.
 *
 * Templates use the `%(field)s` placeholder syntax of existing logging
 * documents, e.g. `%(asctime)s - %(name)s - %(levelname)s - %(message)s`.
 * Placeholders that are not built-in record fields are looked up in the
 * record's structured args.
 */

import { SEVERITY_LABELS, SEVERITY_VALUES } from './severity.js';
import type { LogRecord } from './types.js';

/** Template used when a sink has no formatter */
export const DEFAULT_TEMPLATE = '%(message)s';

const PLACEHOLDER_RE = /%%|%\(([^)]+)\)(-?)(\d*)(?:\.(\d+))?([sdifr])/g;

const MAX_CAUSE_DEPTH = 8;

// ─── Time ────────────────────────────────────────────────────────────────────

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

/**
 * Format a timestamp in local time.
 *
 * Without `datefmt` the result is `YYYY-MM-DD HH:MM:SS,mmm`. With `datefmt`
 * the strftime directives %Y %y %m %d %H %M %S %j and %% are honoured.
 */
export function formatTime(date: Date, datefmt?: string): string {
	if (!datefmt) {
		return (
			`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
			`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())},` +
			pad(date.getMilliseconds(), 3)
		);
	}

	return datefmt.replace(/%([%YymdHMSj])/g, (_match, directive: string) => {
		switch (directive) {
			case 'Y':
				return String(date.getFullYear());
			case 'y':
				return pad(date.getFullYear() % 100);
			case 'm':
				return pad(date.getMonth() + 1);
			case 'd':
				return pad(date.getDate());
			case 'H':
				return pad(date.getHours());
			case 'M':
				return pad(date.getMinutes());
			case 'S':
				return pad(date.getSeconds());
			case 'j': {
				const start = new Date(date.getFullYear(), 0, 1);
				const day = Math.floor((date.getTime() - start.getTime()) / 86_400_000) + 1;
				return pad(day, 3);
			}
			default:
				return '%';
		}
	});
}

// ─── Values ──────────────────────────────────────────────────────────────────

function stringify(value: unknown): string {
	if (typeof value === 'string') return value;
	if (value === undefined) return 'undefined';
	if (value instanceof Error) return `${value.name}: ${value.message}`;
	if (typeof value === 'object' && value !== null) {
		try {
			return JSON.stringify(value);
		} catch {
			return String(value);
		}
	}
	return String(value);
}

function lookupField(record: LogRecord, field: string, datefmt?: string): unknown {
	const created = new Date(record.timestamp);
	switch (field) {
		case 'name':
			return record.logger;
		case 'levelname':
			return SEVERITY_LABELS[record.severity];
		case 'levelno':
			return SEVERITY_VALUES[record.severity];
		case 'message':
			return record.message;
		case 'asctime':
			return formatTime(created, datefmt);
		case 'created':
			return created.getTime() / 1000;
		case 'msecs':
			return created.getMilliseconds();
		case 'process':
			return process.pid;
		case 'id':
			return record.id;
		default:
			return Object.hasOwn(record.args, field) ? record.args[field] : undefined;
	}
}

function convert(value: unknown, conversion: string, precision: string | undefined): string {
	switch (conversion) {
		case 'd':
		case 'i':
			return String(Math.trunc(Number(value)));
		case 'f':
			return Number(value).toFixed(precision ? Number.parseInt(precision, 10) : 6);
		case 'r':
			return typeof value === 'string' ? `'${value}'` : stringify(value);
		default:
			return stringify(value);
	}
}

// ─── Rendering ───────────────────────────────────────────────────────────────

/**
 * Render a template against a record.
 * Placeholders naming neither a record field nor an arg are left as written.
 */
export function renderTemplate(template: string, record: LogRecord, datefmt?: string): string {
	return template.replace(
		PLACEHOLDER_RE,
		(
			match: string,
			field: string | undefined,
			leftAlign: string,
			width: string,
			precision: string | undefined,
			conversion: string,
		) => {
			if (match === '%%') return '%';
			if (field === undefined) return match;
			const value = lookupField(record, field, datefmt);
			if (value === undefined) return match;
			const text = convert(value, conversion, precision);
			if (!width) return text;
			const size = Number.parseInt(width, 10);
			if (leftAlign) return text.padEnd(size);
			return text.padStart(size, width.startsWith('0') ? '0' : ' ');
		},
	);
}

/** A compiled formatter attached to one sink. */
export class RecordFormatter {
	readonly template: string;
	readonly datefmt?: string;

	constructor(template: string = DEFAULT_TEMPLATE, datefmt?: string) {
		this.template = template;
		this.datefmt = datefmt;
	}

	format(record: LogRecord): string {
		const line = renderTemplate(this.template, record, this.datefmt);
		if (!record.trace) return line;
		return line.endsWith('\n') ? `${line}${record.trace}` : `${line}\n${record.trace}`;
	}
}

// ─── Failure traces ──────────────────────────────────────────────────────────

/**
 * Render a thrown value as a multi-line trace, following `cause` chains.
 */
export function formatTrace(failure: unknown, depth = 0): string {
	if (failure instanceof Error) {
		const head = failure.stack ?? `${failure.name}: ${failure.message}`;
		if (failure.cause === undefined || depth >= MAX_CAUSE_DEPTH) return head;
		return `${head}\nCaused by: ${formatTrace(failure.cause, depth + 1)}`;
	}
	return `Non-error value thrown: ${stringify(failure)}`;
}
