/**
 * Sink interface — the destinations behind the relay.
 *
 * A sink receives already-formatted lines. Severity filtering and template
 * formatting happen in the runtime's sink adapter, so sinks only write.
 */

import type { z } from 'zod';
import { InvalidConfigurationFormatError } from './errors.js';
import type { LogRecord, RealSinkKind } from './types.js';

/**
 * Sink interface.
 *
 * Implement this to add a new output destination. The relay calls write()
 * once per accepted record, one record at a time, in queue order.
 */
export interface Sink {
	/** Sink kind this implementation serves */
	readonly kind: RealSinkKind;

	/** Initialize with the sink's kind-specific parameters */
	init(config: Record<string, unknown>): Promise<void>;

	/**
	 * Write one formatted line (without trailing newline).
	 * May throw; the relay reports the failure and moves on.
	 */
	write(line: string, record: LogRecord): Promise<void>;

	/** Flush any buffered output */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close) */
	shutdown(): Promise<void>;
}

/**
 * Sink registration — what a sink package exports.
 */
export interface SinkRegistration {
	kind: RealSinkKind;
	/** Sink class */
	sink: new () => Sink;
	/** One-line description for `logrelay list --sinks` */
	description: string;
}

/**
 * Validate a sink's parameters against its schema.
 * Failures surface as InvalidConfigurationFormatError naming the sink kind.
 */
export function parseSinkConfig<T>(
	kind: RealSinkKind,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	config: Record<string, unknown>,
): T {
	const result = schema.safeParse(config);
	if (result.success) return result.data;
	const issues = result.error.issues.map(
		(issue) => `${issue.path.length > 0 ? issue.path.join('.') : kind}: ${issue.message}`,
	);
	throw new InvalidConfigurationFormatError(`${kind} sink`, issues, { cause: result.error });
}
