/**
 * Logger registry — one memoised handle per logger name.
 *
 * Handles resolve their level through the dotted hierarchy of the applied
 * configuration: `a.b.c` uses the spec for `a.b.c`, else `a.b`, else `a`,
 * else the root logger `''`. Until a configuration is applied every record
 * is accepted, so nothing logged during start-up is lost.
 */

import {
	type LogRecord,
	type LoggerSpec,
	type Severity,
	buildRecord,
	formatTrace,
	meetsThreshold,
} from '@logrelay/sdk';

/** Where accepted records go; the coordinator puts them on the queue. */
export type RecordDispatcher = (record: LogRecord) => void;

export class LoggerRegistry {
	private readonly handles = new Map<string, LoggerHandle>();
	private readonly dispatcher: RecordDispatcher;
	private specs: ReadonlyMap<string, Readonly<LoggerSpec>> | null = null;

	constructor(dispatcher: RecordDispatcher) {
		this.dispatcher = dispatcher;
	}

	/** Get the handle for `name`, creating it on first use. Names are case-sensitive. */
	getLogger(name: string): LoggerHandle {
		let handle = this.handles.get(name);
		if (!handle) {
			handle = new LoggerHandle(name, this);
			this.handles.set(name, handle);
		}
		return handle;
	}

	/** Replace the logger specs that levels resolve against. */
	setSpecs(specs: ReadonlyMap<string, Readonly<LoggerSpec>>): void {
		this.specs = specs;
	}

	get configured(): boolean {
		return this.specs !== null;
	}

	/** Names of every handle handed out so far */
	names(): string[] {
		return [...this.handles.keys()];
	}

	/**
	 * The spec governing `name`: its own, its nearest dotted ancestor's, or the
	 * root's. Undefined when none matches.
	 */
	resolveSpec(name: string): Readonly<LoggerSpec> | undefined {
		if (!this.specs) return undefined;
		let current = name;
		for (;;) {
			const spec = this.specs.get(current);
			if (spec) return spec;
			if (current === '') return undefined;
			const dot = current.lastIndexOf('.');
			current = dot === -1 ? '' : current.slice(0, dot);
		}
	}

	/**
	 * Effective level of `name`. `debug` before any configuration is applied;
	 * null when the applied configuration has no spec for it.
	 */
	levelOf(name: string): Severity | null {
		if (!this.specs) return 'debug';
		return this.resolveSpec(name)?.level ?? null;
	}

	isEnabledFor(name: string, severity: Severity): boolean {
		const level = this.levelOf(name);
		return level !== null && meetsThreshold(severity, level);
	}

	/** @internal used by handles */
	dispatch(record: LogRecord): void {
		this.dispatcher(record);
	}
}

// ─── Logger Handle ────────────────────────────────────────────────────────────

export class LoggerHandle {
	readonly name: string;
	private readonly registry: LoggerRegistry;

	constructor(name: string, registry: LoggerRegistry) {
		this.name = name;
		this.registry = registry;
	}

	debug(message: string, args?: Record<string, unknown>): void {
		this.log('debug', message, args);
	}

	info(message: string, args?: Record<string, unknown>): void {
		this.log('info', message, args);
	}

	warn(message: string, args?: Record<string, unknown>): void {
		this.log('warn', message, args);
	}

	error(message: string, args?: Record<string, unknown>): void {
		this.log('error', message, args);
	}

	critical(message: string, args?: Record<string, unknown>): void {
		this.log('critical', message, args);
	}

	log(severity: Severity, message: string, args?: Record<string, unknown>): void {
		if (!this.isEnabledFor(severity)) return;
		this.registry.dispatch(buildRecord({ logger: this.name, severity, message, args }));
	}

	/**
	 * Log at error severity with the failure's trace appended after the
	 * formatted message.
	 */
	exception(message: string, failure: unknown, args?: Record<string, unknown>): void {
		if (!this.isEnabledFor('error')) return;
		this.registry.dispatch(
			buildRecord({
				logger: this.name,
				severity: 'error',
				message,
				args,
				trace: formatTrace(failure),
			}),
		);
	}

	isEnabledFor(severity: Severity): boolean {
		return this.registry.isEnabledFor(this.name, severity);
	}
}
