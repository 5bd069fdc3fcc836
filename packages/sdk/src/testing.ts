/**
 * Test harness for logrelay sink authors and runtime tests.
 *
 * Provides a recording sink and helpers for building records and documents.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { type BuildRecordOptions, buildRecord } from './record.js';
import type { Sink } from './sink.js';
import type { LogRecord, RealSinkKind } from './types.js';

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Mock sink for testing.
 * Records every written line and record for assertion.
 */
export class MockSink implements Sink {
	readonly kind: RealSinkKind;
	readonly lines: string[] = [];
	readonly records: LogRecord[] = [];
	config: Record<string, unknown> | null = null;
	initialized = false;
	flushCount = 0;
	shutdownCalled = false;
	private failure: Error | null = null;
	private initFailure: Error | null = null;
	private delayMs = 0;

	constructor(kind: RealSinkKind = 'stream') {
		this.kind = kind;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		if (this.initFailure) throw this.initFailure;
		this.config = config;
		this.initialized = true;
	}

	/** Make subsequent writes throw (null to recover) */
	setError(error: Error | null): void {
		this.failure = error;
	}

	/** Make init() throw */
	setInitError(error: Error | null): void {
		this.initFailure = error;
	}

	/** Delay each write, to keep records in flight */
	setDelay(ms: number): void {
		this.delayMs = ms;
	}

	async write(line: string, record: LogRecord): Promise<void> {
		if (this.delayMs > 0) await sleep(this.delayMs);
		if (this.failure) throw this.failure;
		this.lines.push(line);
		this.records.push(record);
	}

	async flush(): Promise<void> {
		this.flushCount++;
	}

	async shutdown(): Promise<void> {
		this.shutdownCalled = true;
	}

	/** Messages of every record written so far */
	get messages(): string[] {
		return this.records.map((r) => r.message);
	}
}

// ─── Test Record Factory ──────────────────────────────────────────────────────

/**
 * Create a test record with sensible defaults.
 */
export function createTestRecord(overrides?: Partial<BuildRecordOptions>): LogRecord {
	return buildRecord({
		logger: 'test-logger',
		severity: 'info',
		message: 'test message',
		...overrides,
	});
}

/**
 * Build a parsed configuration tree with one console sink and one logger.
 */
export function createTestDocumentTree(
	overrides: { level?: string; logger?: string; format?: string } = {},
): Record<string, unknown> {
	const logger = overrides.logger ?? '';
	return {
		version: 1,
		formatters: {
			standard: { format: overrides.format ?? '%(levelname)s %(name)s %(message)s' },
		},
		handlers: {
			console: {
				class: 'logging.StreamHandler',
				level: overrides.level ?? 'DEBUG',
				formatter: 'standard',
				stream: 'ext://sys.stdout',
			},
		},
		loggers: {
			[logger]: { handlers: ['console'], level: overrides.level ?? 'DEBUG' },
		},
	};
}
