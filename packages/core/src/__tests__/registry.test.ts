import type { LogRecord, LoggerSpec } from '@logrelay/sdk';
import { beforeEach, describe, expect, it } from 'vitest';
import { LoggerRegistry } from '../registry.js';

function specs(entries: Array<[string, LoggerSpec['level']]>): Map<string, LoggerSpec> {
	return new Map(
		entries.map(([name, level]) => [name, { name, level, sinks: ['queue'], propagate: true }]),
	);
}

let records: LogRecord[];
let registry: LoggerRegistry;

beforeEach(() => {
	records = [];
	registry = new LoggerRegistry((record) => records.push(record));
});

describe('LoggerRegistry', () => {
	it('memoises handles by exact name', () => {
		expect(registry.getLogger('app')).toBe(registry.getLogger('app'));
		expect(registry.getLogger('app')).not.toBe(registry.getLogger('App'));
		expect(registry.names()).toEqual(['app', 'App']);
	});

	it('accepts every record before a configuration is applied', () => {
		registry.getLogger('anything').debug('early');

		expect(registry.configured).toBe(false);
		expect(records.map((r) => r.message)).toEqual(['early']);
	});

	it('resolves levels through dotted ancestors, then the root', () => {
		registry.setSpecs(
			specs([
				['', 'error'],
				['app', 'info'],
				['app.db', 'debug'],
			]),
		);

		expect(registry.levelOf('app.db.pool')).toBe('debug');
		expect(registry.levelOf('app.http')).toBe('info');
		expect(registry.levelOf('other')).toBe('error');
		expect(registry.resolveSpec('app.db.pool')?.name).toBe('app.db');
	});

	it('drops records when no spec matches', () => {
		registry.setSpecs(specs([['app', 'debug']]));
		registry.getLogger('other').critical('lost');

		expect(registry.levelOf('other')).toBeNull();
		expect(records).toEqual([]);
	});

	it('filters below the logger level', () => {
		registry.setSpecs(specs([['app', 'warn']]));
		const logger = registry.getLogger('app');
		logger.debug('d');
		logger.info('i');
		logger.warn('w');
		logger.error('e');
		logger.critical('c');

		expect(records.map((r) => r.severity)).toEqual(['warn', 'error', 'critical']);
		expect(logger.isEnabledFor('info')).toBe(false);
		expect(logger.isEnabledFor('warn')).toBe(true);
	});

	it('builds records with the logger name and args', () => {
		registry.getLogger('app.http').log('info', 'request', { status: 200 });

		expect(records).toHaveLength(1);
		expect(records[0]).toMatchObject({
			logger: 'app.http',
			severity: 'info',
			message: 'request',
			args: { status: 200 },
		});
		expect(records[0].id).toMatch(/^rec_/);
	});

	it('attaches a failure trace with exception()', () => {
		const failure = new Error('boom');
		registry.getLogger('app').exception('request failed', failure);

		expect(records[0].severity).toBe('error');
		expect(records[0].message).toBe('request failed');
		expect(records[0].trace).toBe(failure.stack);
	});
});
