/**
 * Error taxonomy.
 *
 * Everything the coordinator raises to callers of load/apply extends
 * LogRelayError so callers can tell configuration problems from bugs.
 */

export class LogRelayError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** No document source knows the identifier, or it is not loaded. */
export class ConfigurationNotFoundError extends LogRelayError {
	constructor(
		readonly identifier: string,
		detail?: string,
	) {
		super(`Configuration "${identifier}" not found${detail ? `: ${detail}` : '.'}`);
	}
}

/** A document (or a sink's parameters) does not have the expected shape. */
export class InvalidConfigurationFormatError extends LogRelayError {
	constructor(
		readonly identifier: string,
		readonly issues: string[],
		options?: { cause?: unknown },
	) {
		super(`Invalid configuration "${identifier}": ${issues.join('; ')}`, options);
	}
}

/** A sink's kind/class has no implementation. */
export class UnknownSinkKindError extends LogRelayError {
	constructor(
		readonly sinkName: string,
		readonly kind: string,
	) {
		super(`Unknown sink kind "${kind}" for sink "${sinkName}"`);
	}
}

/** A sink references a formatter absent from the merged configuration. */
export class MissingFormatterError extends LogRelayError {
	constructor(
		readonly sinkName: string,
		readonly formatter: string,
	) {
		super(`Sink "${sinkName}" references missing formatter "${formatter}"`);
	}
}

/** A logger was requested before any configuration was applied. */
export class NotConfiguredError extends LogRelayError {
	constructor(detail = 'no configuration has been applied') {
		super(`Logging is not configured: ${detail}`);
	}
}
