import { setTimeout as sleep } from 'node:timers/promises';
import {
	type LogRecord,
	MockSink,
	RecordFormatter,
	type Severity,
	createTestRecord,
} from '@logrelay/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { SinkAdapter } from '../adapter.js';
import { DispatchQueue } from '../queue.js';
import { QueueRelay } from '../relay.js';

function makeAdapter(name: string, threshold: Severity = 'debug', template = '%(levelname)s %(message)s') {
	const sink = new MockSink();
	const adapter = new SinkAdapter({
		name,
		kind: 'stream',
		sink,
		formatter: new RecordFormatter(template),
		threshold,
	});
	return { sink, adapter };
}

const relays: QueueRelay[] = [];

function makeRelay(queue: DispatchQueue<LogRecord>, adapters: SinkAdapter[], onError = vi.fn()) {
	const relay = new QueueRelay(queue, adapters, { onError });
	relays.push(relay);
	return relay;
}

afterEach(async () => {
	await Promise.all(relays.splice(0).map((relay) => relay.stop()));
});

describe('SinkAdapter', () => {
	it('filters by threshold and writes the formatted line', async () => {
		const { sink, adapter } = makeAdapter('console', 'error');

		expect(await adapter.handle(createTestRecord({ severity: 'info', message: 'quiet' }))).toBe(false);
		expect(await adapter.handle(createTestRecord({ severity: 'error', message: 'loud' }))).toBe(true);
		expect(sink.lines).toEqual(['ERROR loud']);
	});
});

describe('QueueRelay', () => {
	it('starts stopped and moves through its states', async () => {
		const relay = makeRelay(new DispatchQueue<LogRecord>(), []);
		expect(relay.state).toBe('stopped');

		relay.start();
		expect(relay.state).toBe('running');

		const stopping = relay.stop();
		expect(relay.state).toBe('stopping');
		await stopping;
		expect(relay.state).toBe('stopped');
	});

	it('leaves records queued while stopped', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const { sink, adapter } = makeAdapter('console');
		makeRelay(queue, [adapter]);
		void queue.put(createTestRecord());
		await sleep(5);

		expect(queue.size).toBe(1);
		expect(sink.lines).toEqual([]);
	});

	it('delivers records in FIFO order to every accepting adapter', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const all = makeAdapter('all');
		const errors = makeAdapter('errors', 'error');
		const relay = makeRelay(queue, [all.adapter, errors.adapter]);
		relay.start();

		void queue.put(createTestRecord({ severity: 'info', message: 'one' }));
		void queue.put(createTestRecord({ severity: 'error', message: 'two' }));
		void queue.put(createTestRecord({ severity: 'debug', message: 'three' }));
		await relay.flush();

		expect(all.sink.messages).toEqual(['one', 'two', 'three']);
		expect(errors.sink.messages).toEqual(['two']);
		expect(relay.delivered).toBe(3);
	});

	it('flush drains records queued before start', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const { sink, adapter } = makeAdapter('console');
		void queue.put(createTestRecord({ message: 'early' }));
		const relay = makeRelay(queue, [adapter]);

		await relay.flush();

		expect(sink.messages).toEqual(['early']);
		expect(sink.flushCount).toBe(1);
		expect(queue.size).toBe(0);
	});

	it('keeps FIFO order when flush runs during a slow delivery', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const { sink, adapter } = makeAdapter('slow');
		sink.setDelay(5);
		const relay = makeRelay(queue, [adapter]);
		relay.start();

		for (let i = 0; i < 5; i++) void queue.put(createTestRecord({ message: `m${i}` }));
		await relay.flush();

		expect(sink.messages).toEqual(['m0', 'm1', 'm2', 'm3', 'm4']);
	});

	it('reports failing sinks and keeps delivering', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const broken = makeAdapter('broken');
		const healthy = makeAdapter('healthy');
		broken.sink.setError(new Error('disk full'));
		const onError = vi.fn();
		const relay = makeRelay(queue, [broken.adapter, healthy.adapter], onError);
		relay.start();

		void queue.put(createTestRecord({ message: 'a' }));
		void queue.put(createTestRecord({ message: 'b' }));
		await relay.flush();

		expect(healthy.sink.messages).toEqual(['a', 'b']);
		expect(onError).toHaveBeenCalledTimes(2);
		expect(onError.mock.calls[0][0]).toEqual(new Error('disk full'));
		expect(onError.mock.calls[0][1]).toBe(broken.adapter);
		expect(relay.failures).toBe(2);
		expect(relay.state).toBe('running');
	});

	it('finishes the in-flight record on stop and leaves the rest queued', async () => {
		const queue = new DispatchQueue<LogRecord>();
		const { sink, adapter } = makeAdapter('slow');
		sink.setDelay(20);
		const relay = makeRelay(queue, [adapter]);
		relay.start();

		void queue.put(createTestRecord({ message: 'first' }));
		void queue.put(createTestRecord({ message: 'second' }));
		await sleep(5);
		await relay.stop();

		expect(sink.messages).toEqual(['first']);
		expect(queue.size).toBe(1);

		const next = makeRelay(queue, [adapter]);
		await next.flush();
		expect(sink.messages).toEqual(['first', 'second']);
	});

	it('refuses to start while stopping', async () => {
		const relay = makeRelay(new DispatchQueue<LogRecord>(), []);
		relay.start();
		const stopping = relay.stop();

		expect(() => relay.start()).toThrow('still stopping');
		await stopping;
	});
});
