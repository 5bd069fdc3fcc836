/**
 * Queue relay — the single consumer of the dispatch queue.
 *
 * State machine: stopped → running → stopping → stopped. A relay is bound to
 * one adapter set for its lifetime; reconfiguration replaces the relay, not
 * its adapters. Records left in the queue when a relay stops are picked up by
 * the next one.
 */

import type { LogRecord } from '@logrelay/sdk';
import type { SinkAdapter } from './adapter.js';
import type { DispatchQueue } from './queue.js';

export type RelayState = 'stopped' | 'running' | 'stopping';

/**
 * Receives delivery failures; the relay carries on with the next record.
 * `record` is absent when the failure came from flushing the sink.
 */
export type DeliveryErrorHandler = (
	error: unknown,
	adapter: SinkAdapter,
	record: LogRecord | undefined,
) => void;

export interface QueueRelayOptions {
	onError?: DeliveryErrorHandler;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

const writeToStderr: DeliveryErrorHandler = (error, adapter) => {
	process.stderr.write(`[logrelay] sink "${adapter.name}" failed: ${describe(error)}\n`);
};

export class QueueRelay {
	readonly adapters: readonly SinkAdapter[];
	private readonly queue: DispatchQueue<LogRecord>;
	private readonly onError: DeliveryErrorHandler;
	private currentState: RelayState = 'stopped';
	private controller: AbortController | null = null;
	private loop: Promise<void> | null = null;
	/** Last delivery in FIFO order; the loop and flush both chain onto it */
	private tail: Promise<void> = Promise.resolve();
	private deliveredCount = 0;
	private failureCount = 0;

	constructor(
		queue: DispatchQueue<LogRecord>,
		adapters: readonly SinkAdapter[],
		options: QueueRelayOptions = {},
	) {
		this.queue = queue;
		this.adapters = adapters;
		this.onError = options.onError ?? writeToStderr;
	}

	get state(): RelayState {
		return this.currentState;
	}

	/** Records handed to the adapter set */
	get delivered(): number {
		return this.deliveredCount;
	}

	/** Adapter writes that threw */
	get failures(): number {
		return this.failureCount;
	}

	/**
	 * Start consuming. No-op when already running.
	 * @throws Error when called while the relay is stopping
	 */
	start(): void {
		if (this.currentState === 'running') return;
		if (this.currentState === 'stopping') {
			throw new Error('Cannot start a relay that is still stopping');
		}
		const controller = new AbortController();
		this.controller = controller;
		this.currentState = 'running';
		this.loop = this.run(controller.signal);
	}

	/**
	 * Stop cooperatively: a waiting consumer wakes, an in-flight record
	 * finishes, queued records stay queued.
	 */
	async stop(): Promise<void> {
		if (this.currentState === 'stopped') return;
		this.currentState = 'stopping';
		this.controller?.abort();
		await this.loop;
		await this.tail;
		this.controller = null;
		this.loop = null;
		this.currentState = 'stopped';
	}

	/**
	 * Deliver every record queued when the call starts, wait for all
	 * deliveries already in progress, then flush the adapters.
	 */
	async flush(): Promise<void> {
		const pending = this.queue.size;
		for (let i = 0; i < pending; i++) {
			const record = this.queue.poll();
			if (record === undefined) break;
			this.chain(record);
		}
		await this.tail;

		const results = await Promise.allSettled(this.adapters.map((adapter) => adapter.flush()));
		for (const [index, result] of results.entries()) {
			const adapter = this.adapters[index];
			if (result.status === 'rejected' && adapter) {
				this.failureCount++;
				this.report(result.reason, adapter, undefined);
			}
		}
	}

	// ─── Consumer loop ────────────────────────────────────────────────────────

	private async run(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			const record = this.queue.poll();
			if (record === undefined) {
				const ready = await this.queue.waitForItem(signal);
				if (!ready) break;
				continue;
			}
			await this.chain(record);
		}
	}

	private chain(record: LogRecord): Promise<void> {
		const delivery = this.tail.then(() => this.deliver(record));
		this.tail = delivery;
		return delivery;
	}

	private async deliver(record: LogRecord): Promise<void> {
		const results = await Promise.allSettled(this.adapters.map((adapter) => adapter.handle(record)));
		this.deliveredCount++;
		for (const [index, result] of results.entries()) {
			const adapter = this.adapters[index];
			if (result.status === 'rejected' && adapter) {
				this.failureCount++;
				this.report(result.reason, adapter, record);
			}
		}
	}

	private report(error: unknown, adapter: SinkAdapter, record: LogRecord | undefined): void {
		try {
			this.onError(error, adapter, record);
		} catch (handlerError) {
			process.stderr.write(`[logrelay] delivery error handler failed: ${describe(handlerError)}\n`);
		}
	}
}
