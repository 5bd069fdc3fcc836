/**
 * Console sink — writes formatted lines to stdout or stderr.
 *
 * Defaults to stderr so stdout stays clean for program output. With
 * `color: true` lines are tinted by severity.
 */

import type { Writable } from 'node:stream';
import { type LogRecord, type Severity, type Sink, parseSinkConfig } from '@logrelay/sdk';
import { Chalk, type ChalkInstance } from 'chalk';
import { z } from 'zod';

const ConsoleSinkConfigSchema = z
	.object({
		stream: z
			.enum(['stdout', 'stderr', 'ext://sys.stdout', 'ext://sys.stderr'])
			.default('ext://sys.stderr'),
		color: z.boolean().default(false),
	})
	.passthrough();

export type ConsoleSinkConfig = z.infer<typeof ConsoleSinkConfigSchema>;

export interface ConsoleStreams {
	stdout: Writable;
	stderr: Writable;
}

function tint(chalk: ChalkInstance, severity: Severity, line: string): string {
	switch (severity) {
		case 'debug':
			return chalk.gray(line);
		case 'info':
			return line;
		case 'warn':
			return chalk.yellow(line);
		case 'error':
			return chalk.red(line);
		case 'critical':
			return chalk.bold.red(line);
	}
}

export class ConsoleSink implements Sink {
	readonly kind = 'stream';
	private readonly streams: ConsoleStreams;
	private output: Writable;
	private chalk: ChalkInstance | null = null;

	/** @param streams - replaces process.stdout/stderr, for tests */
	constructor(streams?: ConsoleStreams) {
		this.streams = streams ?? { stdout: process.stdout, stderr: process.stderr };
		this.output = this.streams.stderr;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		const cfg = parseSinkConfig('stream', ConsoleSinkConfigSchema, config);
		this.output = cfg.stream.endsWith('stdout') ? this.streams.stdout : this.streams.stderr;
		this.chalk = cfg.color ? new Chalk({ level: 1 }) : null;
	}

	async write(line: string, record: LogRecord): Promise<void> {
		const text = this.chalk ? tint(this.chalk, record.severity, line) : line;
		await new Promise<void>((resolve, reject) => {
			this.output.write(`${text}\n`, (err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	async flush(): Promise<void> {
		// Each write already waited for its callback
	}

	async shutdown(): Promise<void> {
		// The process owns stdout and stderr
	}
}
