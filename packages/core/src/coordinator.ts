/**
 * LoggingCoordinator — owns the documents, the dispatch queue, the relay and
 * the logger registry.
 *
 * Library-first API:
 *   const logging = new LoggingCoordinator();
 *   await logging.load('logging_console');
 *   logging.getLogger('app').info('started');
 *   await logging.shutdown();
 */

import { EventEmitter } from 'node:events';
import {
	DEFAULT_TEMPLATE,
	type EffectiveConfiguration,
	type LoadOverrides,
	type LoadRequest,
	type LoadedDocument,
	type LogRecord,
	ConfigurationNotFoundError,
	MissingFormatterError,
	NotConfiguredError,
	type RealSinkKind,
	type RealSinkSpec,
	RecordFormatter,
	type Severity,
	type Sink,
	UnknownSinkKindError,
} from '@logrelay/sdk';
import { ConsoleSink } from '@logrelay/sink-console';
import { FileSink, RotatingFileSink } from '@logrelay/sink-file';
import { SinkAdapter } from './adapter.js';
import { applyOverrides, parseDocument } from './document.js';
import { type MergeResult, mergeDocuments, resolveSinkKind, validateMerge } from './merge.js';
import { DispatchQueue, type DispatchQueueOptions } from './queue.js';
import { QueueRelay, type RelayState } from './relay.js';
import { type LoggerHandle, LoggerRegistry } from './registry.js';
import { DirectoryDocumentSource, type DocumentSource } from './source.js';
import { type ProcessHooks, UncaughtFailureHook, nodeProcessHooks } from './uncaught.js';

/** Document applied by the first getLogger() call when nothing is configured */
export const DEFAULT_BOOTSTRAP_IDENTIFIER = 'logging_console';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface LoggingCoordinatorOptions {
	/** Where identifiers are resolved (default: DirectoryDocumentSource over the built-ins) */
	source?: DocumentSource;
	/** Apply a console configuration on first getLogger() when unconfigured (default: true) */
	autoBootstrap?: boolean;
	/** Document the bootstrap applies (default: logging_console) */
	bootstrapIdentifier?: string;
	/** Dispatch queue bounds (default: unbounded) */
	queue?: DispatchQueueOptions;
	/** Replace the built-in sink for a kind, e.g. with a MockSink in tests */
	sinks?: Partial<Record<RealSinkKind, () => Sink>>;
	/** Process bindings for the uncaught-failure hook; false skips installing it */
	processHooks?: ProcessHooks | false;
}

export interface SinkStatus {
	name: string;
	kind: RealSinkKind;
	threshold: Severity;
	source?: string;
}

export interface CoordinatorStatus {
	configured: boolean;
	relay: RelayState;
	documents: string[];
	sinks: SinkStatus[];
	loggers: string[];
	queued: number;
	dropped: number;
	delivered: number;
	failures: number;
}

// ─── Events ───────────────────────────────────────────────────────────────────

export interface SinkErrorEvent {
	sink: string;
	error: unknown;
	record?: LogRecord;
}

export interface LoggingCoordinatorEvents {
	applied: [EffectiveConfiguration];
	'sink-error': [SinkErrorEvent];
	error: [Error];
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

// ─── Coordinator ──────────────────────────────────────────────────────────────

export class LoggingCoordinator extends EventEmitter {
	private readonly source: DocumentSource;
	private readonly autoBootstrap: boolean;
	private readonly bootstrapIdentifier: string;
	private readonly sinkFactories: Partial<Record<RealSinkKind, () => Sink>>;
	private readonly queue: DispatchQueue<LogRecord>;
	private readonly registry: LoggerRegistry;
	private readonly hook: UncaughtFailureHook | null;
	private documentMap = new Map<string, LoadedDocument>();
	private current: MergeResult | null = null;
	private relay: QueueRelay | null = null;
	private configured = false;
	/** Applies run one at a time, in call order */
	private applyChain: Promise<void> = Promise.resolve();
	private pendingApplies = 0;
	private bootstrap: Promise<void> | null = null;
	private shutdownPromise: Promise<void> | null = null;
	/** Relay counters carried over from replaced relays */
	private retiredDelivered = 0;
	private retiredFailures = 0;

	constructor(options: LoggingCoordinatorOptions = {}) {
		super();
		this.source = options.source ?? new DirectoryDocumentSource();
		this.autoBootstrap = options.autoBootstrap ?? true;
		this.bootstrapIdentifier = options.bootstrapIdentifier ?? DEFAULT_BOOTSTRAP_IDENTIFIER;
		this.sinkFactories = options.sinks ?? {};
		this.queue = new DispatchQueue<LogRecord>(options.queue);
		this.registry = new LoggerRegistry((record) => {
			void this.queue.put(record);
		});

		const hooks = options.processHooks ?? nodeProcessHooks;
		this.hook = hooks === false ? null : new UncaughtFailureHook(this, hooks);
		this.hook?.install();
	}

	// ─── Loading ──────────────────────────────────────────────────────────────

	/**
	 * Load (or reload) one document and apply the result.
	 * A reloaded identifier replaces its previous document and moves to the
	 * end of the load order.
	 */
	async load(identifier: string, overrides?: LoadOverrides): Promise<void> {
		await this.loadMany([{ identifier, overrides }]);
	}

	/**
	 * Load several documents in order and apply them once. If any of them
	 * fails to resolve, parse or apply, none of them takes effect.
	 */
	async loadMany(requests: readonly LoadRequest[]): Promise<void> {
		await this.exclusive(async () => {
			const loaded: LoadedDocument[] = [];
			for (const request of requests) {
				const tree = await this.source.resolve(request.identifier);
				loaded.push(applyOverrides(parseDocument(request.identifier, tree), request.overrides));
			}
			const next = new Map(this.documentMap);
			for (const document of loaded) {
				next.delete(document.identity);
				next.set(document.identity, document);
			}
			await this.commit(next);
		});
	}

	/**
	 * Drop a loaded document and re-apply the rest.
	 * @throws ConfigurationNotFoundError when the identifier is not loaded
	 */
	async remove(identifier: string): Promise<void> {
		await this.exclusive(async () => {
			if (!this.documentMap.has(identifier)) {
				throw new ConfigurationNotFoundError(identifier, 'it is not loaded');
			}
			const next = new Map(this.documentMap);
			next.delete(identifier);
			await this.commit(next);
		});
	}

	/** Re-apply the loaded documents. */
	async apply(): Promise<void> {
		await this.exclusive(() => this.commit(new Map(this.documentMap)));
	}

	// ─── Producers ────────────────────────────────────────────────────────────

	/**
	 * Get the handle for a logger name.
	 *
	 * When nothing has been configured or requested yet, the bootstrap document
	 * is applied in the background (records queue until it lands), or, with
	 * autoBootstrap disabled, NotConfiguredError is thrown.
	 */
	getLogger(name: string): LoggerHandle {
		if (!this.configured && this.pendingApplies === 0 && !this.bootstrap) {
			if (!this.autoBootstrap) {
				throw new NotConfiguredError(`load a configuration before getLogger("${name}")`);
			}
			this.bootstrap = this.load(this.bootstrapIdentifier, { level: 'debug' }).catch((err) => {
				this.reportError(err);
			});
		}
		return this.registry.getLogger(name);
	}

	/** Resolves once every apply requested so far has settled. */
	async ready(): Promise<void> {
		await this.applyChain;
	}

	/**
	 * Deliver every record queued now to the current sinks and flush them.
	 * Waits for pending applies first so bootstrap records are not stranded.
	 */
	async flush(): Promise<void> {
		await this.applyChain;
		await this.relay?.flush();
	}

	/**
	 * Flush, stop the relay, close every sink and remove the process hooks.
	 * Runs once; later calls return the same promise.
	 */
	shutdown(): Promise<void> {
		this.shutdownPromise ??= this.exclusive(async () => {
			const relay = this.relay;
			if (relay) {
				await relay.flush();
				await relay.stop();
				this.retire(relay);
				await this.closeAdapters(relay.adapters);
			}
			this.relay = null;
			this.hook?.uninstall();
		});
		return this.shutdownPromise;
	}

	// ─── Introspection ────────────────────────────────────────────────────────

	/** Loaded documents in load order */
	documents(): LoadedDocument[] {
		return [...this.documentMap.values()];
	}

	/** The configuration currently applied, or null before the first apply */
	effective(): EffectiveConfiguration | null {
		return this.current?.config ?? null;
	}

	/** The concrete sinks of the current configuration */
	realSinks(): readonly RealSinkSpec[] {
		return this.current?.realSinks ?? [];
	}

	status(): CoordinatorStatus {
		const relay = this.relay;
		return {
			configured: this.configured,
			relay: relay?.state ?? 'stopped',
			documents: [...this.documentMap.keys()],
			sinks: (relay?.adapters ?? []).map((adapter) => ({
				name: adapter.name,
				kind: adapter.kind,
				threshold: adapter.threshold,
				source: adapter.source,
			})),
			loggers: [...(this.current?.config.loggers.keys() ?? [])],
			queued: this.queue.size,
			dropped: this.queue.dropped,
			delivered: this.retiredDelivered + (relay?.delivered ?? 0),
			failures: this.retiredFailures + (relay?.failures ?? 0),
		};
	}

	// ─── Apply ────────────────────────────────────────────────────────────────

	private exclusive(task: () => Promise<void>): Promise<void> {
		this.pendingApplies++;
		const run = this.applyChain.then(task).finally(() => {
			this.pendingApplies--;
		});
		this.applyChain = run.catch(() => undefined);
		return run;
	}

	/**
	 * Merge, build adapters, swap the relay and commit. Nothing is committed
	 * unless every step before the swap succeeds.
	 */
	private async commit(documents: Map<string, LoadedDocument>): Promise<void> {
		const result = mergeDocuments([...documents.values()]);
		const [issue] = validateMerge(result);
		if (issue) throw issue;

		const adapters = await this.buildAdapters(result);

		const previous = this.relay;
		if (previous) await previous.stop();
		const relay = new QueueRelay(this.queue, adapters, {
			onError: (error, adapter, record) => this.reportSinkError(adapter.name, error, record),
		});
		this.relay = relay;
		relay.start();

		if (previous) {
			this.retire(previous);
			await this.closeAdapters(previous.adapters);
		}

		this.documentMap = documents;
		this.current = result;
		this.registry.setSpecs(result.config.loggers);
		this.configured = true;
		this.shutdownPromise = null;
		this.hook?.install();
		this.emit('applied', result.config);
	}

	private createSink(kind: RealSinkKind): Sink {
		const factory = this.sinkFactories[kind];
		if (factory) return factory();
		switch (kind) {
			case 'stream':
				return new ConsoleSink();
			case 'file':
				return new FileSink();
			case 'rotating-file':
				return new RotatingFileSink();
		}
	}

	private async buildAdapters(result: MergeResult): Promise<SinkAdapter[]> {
		const adapters: SinkAdapter[] = [];
		try {
			for (const spec of result.realSinks) {
				const kind = resolveSinkKind(spec.kind);
				if (kind === null) throw new UnknownSinkKindError(spec.name, spec.kind);

				const formatterSpec =
					spec.formatter === undefined ? undefined : result.config.formatters.get(spec.formatter);
				if (spec.formatter !== undefined && !formatterSpec) {
					throw new MissingFormatterError(spec.name, spec.formatter);
				}

				const sink = this.createSink(kind);
				const adapter = new SinkAdapter({
					name: spec.name,
					kind,
					sink,
					formatter: new RecordFormatter(
						formatterSpec?.format ?? DEFAULT_TEMPLATE,
						formatterSpec?.datefmt,
					),
					threshold: spec.level,
					source: spec.source,
				});
				adapters.push(adapter);
				await sink.init(spec.params);
			}
		} catch (err) {
			await this.closeAdapters(adapters);
			throw err;
		}
		return adapters;
	}

	private async closeAdapters(adapters: readonly SinkAdapter[]): Promise<void> {
		const results = await Promise.allSettled(adapters.map((adapter) => adapter.shutdown()));
		for (const [index, result] of results.entries()) {
			const adapter = adapters[index];
			if (result.status === 'rejected' && adapter) {
				this.reportSinkError(adapter.name, result.reason, undefined);
			}
		}
	}

	private retire(relay: QueueRelay): void {
		this.retiredDelivered += relay.delivered;
		this.retiredFailures += relay.failures;
	}

	// ─── Error reporting ──────────────────────────────────────────────────────

	private reportSinkError(sink: string, error: unknown, record: LogRecord | undefined): void {
		if (this.listenerCount('sink-error') > 0) {
			this.emit('sink-error', { sink, error, record });
			return;
		}
		process.stderr.write(`[logrelay] sink "${sink}" failed: ${describe(error)}\n`);
	}

	private reportError(error: unknown): void {
		if (this.listenerCount('error') > 0) {
			this.emit('error', error instanceof Error ? error : new Error(String(error)));
			return;
		}
		process.stderr.write(`[logrelay] ${describe(error)}\n`);
	}
}
