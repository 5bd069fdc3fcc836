/**
 * File sink — appends formatted lines to a file.
 *
 * The parent directory is created on init. Writes go through a single
 * WriteStream and each write resolves once the stream has taken the line.
 */

import { type WriteStream, createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { type LogRecord, type RealSinkKind, type Sink, parseSinkConfig } from '@logrelay/sdk';
import { z } from 'zod';

export const FileSinkConfigSchema = z
	.object({
		filename: z.string().min(1),
		mode: z.enum(['a', 'w']).default('a'),
		encoding: z
			.enum(['utf8', 'utf-8', 'ascii', 'latin1', 'utf16le'])
			.default('utf8')
			.transform((encoding): BufferEncoding => (encoding === 'utf-8' ? 'utf8' : encoding)),
	})
	.passthrough();

export type FileSinkConfig = z.infer<typeof FileSinkConfigSchema>;

/**
 * Open a stream and wait until the file descriptor exists.
 * `onFailure` stays attached for the stream's whole life.
 */
export function openStream(
	path: string,
	flags: 'a' | 'w',
	encoding: BufferEncoding,
	onFailure: (err: Error) => void,
): Promise<WriteStream> {
	return new Promise((resolveOpen, reject) => {
		const stream = createWriteStream(path, { flags, encoding });
		const onOpenError = (err: Error) => reject(err);
		stream.once('error', onOpenError);
		stream.once('open', () => {
			stream.on('error', onFailure);
			stream.off('error', onOpenError);
			resolveOpen(stream);
		});
	});
}

export function writeLine(stream: WriteStream, text: string): Promise<void> {
	return new Promise((resolveWrite, reject) => {
		stream.write(text, (err) => {
			if (err) reject(err);
			else resolveWrite();
		});
	});
}

export function closeStream(stream: WriteStream): Promise<void> {
	return new Promise((resolveClose, reject) => {
		stream.once('error', reject);
		stream.end(() => resolveClose());
	});
}

export class FileSink implements Sink {
	readonly kind: RealSinkKind = 'file';
	protected stream: WriteStream | null = null;
	protected path = '';
	protected encoding: BufferEncoding = 'utf8';
	/** Last error the stream emitted; the failing write rejects with it too */
	lastError: Error | null = null;

	async init(config: Record<string, unknown>): Promise<void> {
		const cfg = parseSinkConfig('file', FileSinkConfigSchema, config);
		await this.open(cfg.filename, cfg.mode, cfg.encoding);
	}

	async write(line: string, _record: LogRecord): Promise<void> {
		await writeLine(await this.writable(), `${line}\n`);
	}

	async flush(): Promise<void> {
		// Writes resolve only after the stream has accepted them
	}

	async shutdown(): Promise<void> {
		const stream = this.stream;
		this.stream = null;
		if (stream && !stream.destroyed) await closeStream(stream);
	}

	protected readonly onStreamError = (err: Error): void => {
		this.lastError = err;
	};

	/** The open stream, reopened for appending if a failed write destroyed it. */
	protected async writable(): Promise<WriteStream> {
		if (!this.stream) throw new Error(`File sink for "${this.path}" is not open`);
		if (this.stream.destroyed) {
			this.stream = await openStream(this.path, 'a', this.encoding, this.onStreamError);
		}
		return this.stream;
	}

	protected async open(filename: string, mode: 'a' | 'w', encoding: BufferEncoding): Promise<void> {
		this.path = resolve(filename);
		this.encoding = encoding;
		await mkdir(dirname(this.path), { recursive: true });
		this.stream = await openStream(this.path, mode, encoding, this.onStreamError);
	}
}
