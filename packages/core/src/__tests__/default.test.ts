import { MockSink, NotConfiguredError, createTestDocumentTree } from '@logrelay/sdk';
import { afterEach, describe, expect, it } from 'vitest';
import { getDefaultCoordinator, getLogger, initLogging, resetDefaultCoordinator } from '../default.js';
import { InMemoryDocumentSource } from '../source.js';

afterEach(async () => {
	await resetDefaultCoordinator();
});

describe('default coordinator', () => {
	it('throws before initLogging', () => {
		expect(() => getDefaultCoordinator()).toThrow(NotConfiguredError);
		expect(() => getLogger('app')).toThrow(NotConfiguredError);
	});

	it('returns the same coordinator on repeated initLogging calls', () => {
		const first = initLogging({ processHooks: false, autoBootstrap: false });
		expect(initLogging()).toBe(first);
		expect(getDefaultCoordinator()).toBe(first);
	});

	it('hands out loggers from the default coordinator', async () => {
		const sink = new MockSink();
		const coordinator = initLogging({
			source: new InMemoryDocumentSource({ console: createTestDocumentTree() }),
			processHooks: false,
			sinks: { stream: () => sink },
		});
		await coordinator.load('console');

		getLogger('app').warn('careful');
		await coordinator.flush();

		expect(sink.lines).toEqual(['WARNING app careful']);
	});
});
