/**
 * Configuration merge engine.
 *
 * Combines loaded documents into one EffectiveConfiguration. Every logger is
 * bound to the single relay sink; the documents' concrete sinks are collected
 * separately for the queue relay to own.
 */

import {
	type EffectiveConfiguration,
	type FormatterSpec,
	type LoadedDocument,
	type LoggerSpec,
	MissingFormatterError,
	RELAY_SINK_NAME,
	type RealSinkKind,
	type RealSinkSpec,
	type SinkSpec,
	UnknownSinkKindError,
	minSeverity,
} from '@logrelay/sdk';

export interface MergeResult {
	config: EffectiveConfiguration;
	/** Concrete sinks in document order, delivered to by the relay */
	realSinks: readonly RealSinkSpec[];
}

/** The relay sink synthesised when no document declares one */
export function createRelaySinkSpec(): SinkSpec {
	return { name: RELAY_SINK_NAME, kind: 'relay', params: {} };
}

/**
 * Merge documents in load order. Later documents win ties.
 *
 * Purely structural: sink kinds are not resolved here, so an unknown kind
 * only fails when the result is applied.
 */
export function mergeDocuments(documents: readonly LoadedDocument[]): MergeResult {
	const formatters = new Map<string, FormatterSpec>();
	const sinks = new Map<string, SinkSpec>();
	const loggers = new Map<string, LoggerSpec>();
	const realSinks: RealSinkSpec[] = [];
	let relay: SinkSpec | undefined;

	for (const document of documents) {
		for (const [name, formatter] of document.formatters) {
			const existing = formatters.get(name);
			formatters.set(name, existing ? { ...existing, ...formatter } : { ...formatter });
		}

		for (const sink of document.sinks) {
			if (sink.kind === 'relay') {
				// A later relay declaration refines the first one; there is only ever one.
				relay = relay
					? { ...relay, ...sink, name: relay.name, params: { ...relay.params, ...sink.params } }
					: { ...sink, params: { ...sink.params } };
			} else {
				realSinks.push({ ...sink, params: { ...sink.params }, source: document.identity });
			}
		}
	}

	relay ??= createRelaySinkSpec();
	sinks.set(relay.name, relay);

	for (const document of documents) {
		for (const logger of document.loggers) {
			const existing = loggers.get(logger.name);
			loggers.set(logger.name, {
				name: logger.name,
				level: existing ? minSeverity(existing.level, logger.level) : logger.level,
				sinks: [relay.name],
				propagate: logger.propagate,
			});
		}
	}

	const config: EffectiveConfiguration = Object.freeze({ formatters, sinks, loggers });
	return { config, realSinks: Object.freeze(realSinks) };
}

// ─── Validation ───────────────────────────────────────────────────────────────

const REAL_SINK_KINDS: readonly RealSinkKind[] = ['stream', 'file', 'rotating-file'];

/** Narrow a normalised kind string to an implementable sink kind. */
export function resolveSinkKind(kind: string): RealSinkKind | null {
	return REAL_SINK_KINDS.find((k) => k === kind) ?? null;
}

export type MergeIssue = UnknownSinkKindError | MissingFormatterError;

/**
 * List every real sink that cannot be applied: unknown kinds first checked,
 * then formatter references missing from the merged formatters.
 *
 * @param available - kinds that have an implementation (default: all)
 */
export function validateMerge(
	result: MergeResult,
	available: ReadonlySet<RealSinkKind> = new Set(REAL_SINK_KINDS),
): MergeIssue[] {
	const issues: MergeIssue[] = [];
	for (const sink of result.realSinks) {
		const kind = resolveSinkKind(sink.kind);
		if (kind === null || !available.has(kind)) {
			issues.push(new UnknownSinkKindError(sink.name, sink.kind));
			continue;
		}
		if (sink.formatter !== undefined && !result.config.formatters.has(sink.formatter)) {
			issues.push(new MissingFormatterError(sink.name, sink.formatter));
		}
	}
	return issues;
}
