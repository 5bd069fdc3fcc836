import { describe, expect, it } from 'vitest';
import { buildRecord, generateRecordId, isLogRecord } from '../record.js';

describe('generateRecordId', () => {
	it('generates IDs with rec_ prefix', () => {
		expect(generateRecordId()).toMatch(/^rec_[a-f0-9]{16}$/);
	});

	it('generates unique IDs', () => {
		const ids = new Set(Array.from({ length: 100 }, () => generateRecordId()));
		expect(ids.size).toBe(100);
	});
});

describe('buildRecord', () => {
	it('creates a well-formed record with defaults', () => {
		const record = buildRecord({ logger: 'app', severity: 'info', message: 'hello' });

		expect(record.id).toMatch(/^rec_/);
		expect(record.timestamp).toBeTruthy();
		expect(record.args).toEqual({});
		expect(record.logger).toBe('app');
		expect('trace' in record).toBe(false);
	});

	it('keeps explicit id, timestamp, args and trace', () => {
		const record = buildRecord({
			logger: 'app',
			severity: 'error',
			message: 'failed',
			args: { attempt: 2 },
			trace: 'Error: x',
			id: 'rec_custom',
			timestamp: '2026-01-01T00:00:00.000Z',
		});

		expect(record).toEqual({
			id: 'rec_custom',
			severity: 'error',
			message: 'failed',
			args: { attempt: 2 },
			trace: 'Error: x',
			timestamp: '2026-01-01T00:00:00.000Z',
			logger: 'app',
		});
	});
});

describe('isLogRecord', () => {
	it('accepts built records', () => {
		expect(isLogRecord(buildRecord({ logger: 'a', severity: 'debug', message: 'm' }))).toBe(true);
	});

	it('rejects malformed values', () => {
		expect(isLogRecord(null)).toBe(false);
		expect(isLogRecord({ id: 'x' })).toBe(false);
		expect(
			isLogRecord({
				id: 'rec_1',
				severity: 'loud',
				message: 'm',
				timestamp: 't',
				logger: 'a',
				args: {},
			}),
		).toBe(false);
	});
});
