/**
 * Core types shared by every logrelay package.
 *
 * Documents are parsed into these shapes, merged into an
 * EffectiveConfiguration, and records flow through the pipeline as LogRecord.
 */

// ─── Severity ─────────────────────────────────────────────────────────────────

/** Named severities, lowest to highest. */
export type Severity = 'debug' | 'info' | 'warn' | 'error' | 'critical';

// ─── Sink kinds ───────────────────────────────────────────────────────────────

/** Every sink kind the runtime knows how to build. */
export type SinkKind = 'stream' | 'file' | 'rotating-file' | 'relay';

/** Sink kinds backed by a concrete destination (everything except the relay). */
export type RealSinkKind = Exclude<SinkKind, 'relay'>;

/** Name of the synthetic relay sink every logger is bound to. */
export const RELAY_SINK_NAME = 'queue';

// ─── Configuration ────────────────────────────────────────────────────────────

/** Formatter definition: a template plus optional date format. */
export interface FormatterSpec {
	format?: string;
	datefmt?: string;
	[key: string]: unknown;
}

/** A sink (dictConfig "handler") definition. */
export interface SinkSpec {
	name: string;
	/** Normalised kind string. Unknown kinds survive until apply time. */
	kind: string;
	level?: Severity;
	formatter?: string;
	/** Kind-specific fields: filename, maxBytes, backupCount, stream, ... */
	params: Record<string, unknown>;
}

/** A concrete sink collected by the merge engine for the relay to own. */
export interface RealSinkSpec extends SinkSpec {
	/** Identity of the document that declared the sink */
	source: string;
}

/** A named logger and the sinks it feeds. */
export interface LoggerSpec {
	name: string;
	level: Severity;
	sinks: string[];
	propagate: boolean;
}

/** A parsed configuration document, keyed by the identifier it was loaded from. */
export interface LoadedDocument {
	identity: string;
	formatters: Array<[string, FormatterSpec]>;
	sinks: SinkSpec[];
	loggers: LoggerSpec[];
}

/** The single merged configuration applied to the runtime. */
export interface EffectiveConfiguration {
	readonly formatters: ReadonlyMap<string, Readonly<FormatterSpec>>;
	readonly sinks: ReadonlyMap<string, Readonly<SinkSpec>>;
	readonly loggers: ReadonlyMap<string, Readonly<LoggerSpec>>;
}

/** Per-load adjustments applied to a document before it is merged. */
export interface LoadOverrides {
	/** Replaces `filename` on every sink that has one */
	path?: string;
	/** Sets every sink threshold; loggers of the document drop to debug */
	level?: Severity | string | number;
	/** Formatter name to attach to every concrete sink */
	formatter?: string;
}

/** One entry of a `loadMany` call. */
export interface LoadRequest {
	identifier: string;
	overrides?: LoadOverrides;
}

// ─── Records ──────────────────────────────────────────────────────────────────

/** A single log record travelling from a logger handle to the sinks. */
export interface LogRecord {
	/** Unique record ID (rec_ prefix) */
	id: string;
	severity: Severity;
	message: string;
	/** Structured arguments; also addressable from format templates */
	args: Record<string, unknown>;
	/** Formatted failure trace, appended after the formatted message */
	trace?: string;
	/** ISO 8601 */
	timestamp: string;
	/** Name of the originating logger */
	logger: string;
}
