/**
 * Uncaught-failure hook — logs a process-killing failure before the process dies.
 *
 * The failure is logged once at critical severity through the
 * `uncaught_exceptions` logger, the relay is flushed so the record reaches
 * the sinks, then the default behaviour runs: trace to stderr, exit 1.
 */

import { formatTrace } from '@logrelay/sdk';
import type { LoggerHandle } from './registry.js';

export const UNCAUGHT_LOGGER_NAME = 'uncaught_exceptions';
export const TRACE_START_MARKER = '---------------------Traceback lines-----------------------';
export const TRACE_END_MARKER = '---------------------End of Traceback-----------------------';

// ─── Process abstraction ──────────────────────────────────────────────────────

/**
 * The process-level operations the hook needs.
 * Registration functions return a function that removes the listener.
 */
export interface ProcessHooks {
	onUncaught(listener: (failure: unknown) => void): () => void;
	onBeforeExit(listener: () => void): () => void;
	writeStderr(text: string): void;
	exit(code: number): void;
}

/** ProcessHooks bound to the running Node.js process. */
export const nodeProcessHooks: ProcessHooks = {
	onUncaught(listener) {
		process.on('uncaughtException', listener);
		return () => {
			process.off('uncaughtException', listener);
		};
	},
	onBeforeExit(listener) {
		process.on('beforeExit', listener);
		return () => {
			process.off('beforeExit', listener);
		};
	},
	writeStderr(text) {
		process.stderr.write(text);
	},
	exit(code) {
		process.exit(code);
	},
};

// ─── Hook ─────────────────────────────────────────────────────────────────────

/** What the hook needs from the coordinator. */
export interface UncaughtFailureTarget {
	getLogger(name: string): LoggerHandle;
	flush(): Promise<void>;
	shutdown(): Promise<void>;
}

/** A user-initiated cancellation: an AbortError, whatever produced it. */
export function isCancellation(failure: unknown): boolean {
	return failure instanceof Error && failure.name === 'AbortError';
}

/** The message body of the critical record for an uncaught failure. */
export function formatUncaughtMessage(failure: unknown): string {
	return `${TRACE_START_MARKER}\n${formatTrace(failure)}\n${TRACE_END_MARKER}`;
}

export class UncaughtFailureHook {
	private readonly target: UncaughtFailureTarget;
	private readonly hooks: ProcessHooks;
	private removers: Array<() => void> = [];
	private handling = false;
	private exiting = false;

	constructor(target: UncaughtFailureTarget, hooks: ProcessHooks = nodeProcessHooks) {
		this.target = target;
		this.hooks = hooks;
	}

	get installed(): boolean {
		return this.removers.length > 0;
	}

	/** Register with the process. Idempotent. */
	install(): void {
		if (this.installed) return;
		this.removers = [
			this.hooks.onUncaught((failure) => {
				void this.handle(failure);
			}),
			this.hooks.onBeforeExit(() => {
				void this.handleBeforeExit();
			}),
		];
	}

	uninstall(): void {
		for (const remove of this.removers) remove();
		this.removers = [];
	}

	/**
	 * Log, flush, then run the default behaviour. Cancellations and failures
	 * raised while a previous one is being handled skip straight to the
	 * default behaviour.
	 */
	async handle(failure: unknown): Promise<void> {
		if (this.handling || isCancellation(failure)) {
			this.defaultBehaviour(failure);
			return;
		}
		this.handling = true;
		try {
			this.target.getLogger(UNCAUGHT_LOGGER_NAME).critical(formatUncaughtMessage(failure));
			await this.target.flush();
		} catch (err) {
			this.hooks.writeStderr(
				`[logrelay] could not log uncaught failure: ${err instanceof Error ? err.message : String(err)}\n`,
			);
		}
		this.defaultBehaviour(failure);
	}

	/** Shut the coordinator down once when the event loop drains. */
	async handleBeforeExit(): Promise<void> {
		if (this.exiting) return;
		this.exiting = true;
		try {
			await this.target.shutdown();
		} catch (err) {
			this.hooks.writeStderr(
				`[logrelay] shutdown failed: ${err instanceof Error ? err.message : String(err)}\n`,
			);
		}
	}

	private defaultBehaviour(failure: unknown): void {
		this.hooks.writeStderr(`${formatTrace(failure)}\n`);
		this.hooks.exit(1);
	}
}
