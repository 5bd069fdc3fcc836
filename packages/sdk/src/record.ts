/**
 * Record builder — helpers for creating log records.
 */

import { randomUUID } from 'node:crypto';
import { isSeverity } from './severity.js';
import type { LogRecord, Severity } from './types.js';

/**
 * Generate a unique record ID with the rec_ prefix.
 */
export function generateRecordId(): string {
	return `rec_${randomUUID().replace(/-/g, '').substring(0, 16)}`;
}

/** Options for building a record */
export interface BuildRecordOptions {
	logger: string;
	severity: Severity;
	message: string;
	args?: Record<string, unknown>;
	trace?: string;
	id?: string;
	timestamp?: string;
}

/**
 * Build a well-formed record.
 * Fills in defaults for id, timestamp and args.
 */
export function buildRecord(options: BuildRecordOptions): LogRecord {
	const record: LogRecord = {
		id: options.id ?? generateRecordId(),
		severity: options.severity,
		message: options.message,
		args: options.args ?? {},
		timestamp: options.timestamp ?? new Date().toISOString(),
		logger: options.logger,
	};
	if (options.trace !== undefined) record.trace = options.trace;
	return record;
}

/**
 * Check if a value is a log record (type guard).
 */
export function isLogRecord(value: unknown): value is LogRecord {
	if (!value || typeof value !== 'object') return false;
	const r = value as Record<string, unknown>;
	return (
		typeof r.id === 'string' &&
		r.id.startsWith('rec_') &&
		isSeverity(r.severity) &&
		typeof r.message === 'string' &&
		typeof r.timestamp === 'string' &&
		typeof r.logger === 'string' &&
		typeof r.args === 'object' &&
		r.args !== null
	);
}
