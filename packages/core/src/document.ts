/**
 * Configuration documents — shape validation and load-time overrides.
 *
 * Input is an already-parsed tree (from JSON or YAML) in the dictConfig
 * layout: `formatters`, `handlers`, `loggers` and optionally `root`.
 */

import {
	type FormatterSpec,
	InvalidConfigurationFormatError,
	type LoadOverrides,
	type LoadedDocument,
	type LoggerSpec,
	RELAY_SINK_NAME,
	type Severity,
	type SinkSpec,
	parseSeverity,
} from '@logrelay/sdk';
import { z } from 'zod';

// ─── Schema ───────────────────────────────────────────────────────────────────

const LevelSchema = z.union([z.string(), z.number()]);

const FormatterSchema = z
	.object({
		format: z.string().optional(),
		datefmt: z.string().optional(),
	})
	.passthrough();

const HandlerSchema = z
	.object({
		class: z.string().optional(),
		kind: z.string().optional(),
		level: LevelSchema.optional(),
		formatter: z.string().optional(),
	})
	.passthrough()
	.refine((h) => h.class !== undefined || h.kind !== undefined, {
		message: 'handler needs a "class" or "kind"',
	});

const LoggerSchema = z
	.object({
		level: LevelSchema.optional(),
		handlers: z.array(z.string()).optional(),
		propagate: z.boolean().optional(),
	})
	.passthrough();

const DocumentSchema = z
	.object({
		version: z.number().optional(),
		disable_existing_loggers: z.boolean().optional(),
		formatters: z.record(FormatterSchema).default({}),
		handlers: z.record(HandlerSchema).default({}),
		loggers: z.record(LoggerSchema).default({}),
		root: LoggerSchema.optional(),
	})
	.passthrough();

type RawHandler = z.infer<typeof HandlerSchema>;
type RawLogger = z.infer<typeof LoggerSchema>;

// ─── Kind normalisation ───────────────────────────────────────────────────────

const CLASS_KINDS: Readonly<Record<string, string>> = {
	StreamHandler: 'stream',
	FileHandler: 'file',
	RotatingFileHandler: 'rotating-file',
	QueueHandler: 'relay',
};

/**
 * Normalise a handler's `kind` or dotted `class` into a kind string.
 * Unrecognised class names are returned unchanged; they fail at apply.
 */
export function normalizeKind(handler: { class?: string; kind?: string }): string {
	if (handler.kind !== undefined) return handler.kind;
	const className = handler.class ?? '';
	const lastSegment = className.split('.').pop() ?? className;
	return CLASS_KINDS[lastSegment] ?? className;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

function readLevel(where: string, value: unknown, issues: string[]): Severity {
	const level = parseSeverity(value);
	if (level === null) {
		issues.push(`${where}: unknown level ${JSON.stringify(value)}`);
		return 'debug';
	}
	return level;
}

function toSinkSpec(name: string, raw: RawHandler, issues: string[]): SinkSpec {
	const { class: _class, kind: _kind, level, formatter, ...params } = raw;
	const spec: SinkSpec = { name, kind: normalizeKind(raw), params };
	if (level !== undefined) spec.level = readLevel(`handlers.${name}.level`, level, issues);
	if (formatter !== undefined) spec.formatter = formatter;
	return spec;
}

function toLoggerSpec(name: string, raw: RawLogger, issues: string[]): LoggerSpec {
	const where = name === '' ? 'root.level' : `loggers.${name}.level`;
	return {
		name,
		level: raw.level === undefined ? 'debug' : readLevel(where, raw.level, issues),
		sinks: raw.handlers ? [...raw.handlers] : [],
		propagate: raw.propagate ?? true,
	};
}

/**
 * Validate a parsed tree and convert it into a LoadedDocument.
 *
 * @throws InvalidConfigurationFormatError when the tree is not a document
 */
export function parseDocument(identity: string, tree: unknown): LoadedDocument {
	const result = DocumentSchema.safeParse(tree);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join('.') || '(document)'}: ${issue.message}`,
		);
		throw new InvalidConfigurationFormatError(identity, issues, { cause: result.error });
	}

	const raw = result.data;
	const issues: string[] = [];

	const formatters = Object.entries(raw.formatters).map(
		([name, formatter]): [string, FormatterSpec] => [name, { ...formatter }],
	);
	const sinks = Object.entries(raw.handlers).map(([name, handler]) =>
		toSinkSpec(name, handler, issues),
	);
	const loggers = Object.entries(raw.loggers).map(([name, logger]) =>
		toLoggerSpec(name, logger, issues),
	);
	if (raw.root) {
		const rootIndex = loggers.findIndex((l) => l.name === '');
		const root = toLoggerSpec('', raw.root, issues);
		if (rootIndex >= 0) loggers[rootIndex] = root;
		else loggers.push(root);
	}

	if (issues.length > 0) throw new InvalidConfigurationFormatError(identity, issues);

	return { identity, formatters, sinks, loggers };
}

// ─── Overrides ────────────────────────────────────────────────────────────────

/**
 * Apply load-time overrides, returning a new document.
 *
 * - `path` replaces `filename` on every sink that declares one
 * - `level` becomes every sink's threshold, and the document's loggers drop
 *   to debug so the sinks alone decide what is written
 * - `formatter` is attached to every concrete sink
 */
export function applyOverrides(document: LoadedDocument, overrides?: LoadOverrides): LoadedDocument {
	if (!overrides) return document;

	let level: Severity | undefined;
	if (overrides.level !== undefined) {
		const parsed = parseSeverity(overrides.level);
		if (parsed === null) {
			throw new InvalidConfigurationFormatError(document.identity, [
				`override level: unknown level ${JSON.stringify(overrides.level)}`,
			]);
		}
		level = parsed;
	}

	const sinks = document.sinks.map((sink): SinkSpec => {
		const next: SinkSpec = { ...sink, params: { ...sink.params } };
		if (overrides.path !== undefined && 'filename' in next.params) {
			next.params.filename = overrides.path;
		}
		if (level !== undefined) next.level = level;
		if (
			overrides.formatter !== undefined &&
			next.kind !== 'relay' &&
			next.name !== RELAY_SINK_NAME
		) {
			next.formatter = overrides.formatter;
		}
		return next;
	});

	const loggers = document.loggers.map(
		(logger): LoggerSpec => ({
			...logger,
			sinks: [...logger.sinks],
			level: level !== undefined ? 'debug' : logger.level,
		}),
	);

	return { ...document, sinks, loggers };
}
