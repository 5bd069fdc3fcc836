/**
 * Rotating file sink — a file sink that rolls over at a size limit.
 *
 * Before a line that would take the file to `maxBytes` or beyond, the file
 * is closed and renamed: `app.log.1` → `app.log.2`, ..., `app.log` →
 * `app.log.1`, and a fresh `app.log` is opened. At most `backupCount`
 * backups are kept. Rollover is off when either setting is zero.
 */

import { rename, rm, stat } from 'node:fs/promises';
import { type LogRecord, type RealSinkKind, parseSinkConfig } from '@logrelay/sdk';
import { z } from 'zod';
import { FileSink, FileSinkConfigSchema, closeStream, openStream, writeLine } from './file-sink.js';

const RotatingFileSinkConfigSchema = FileSinkConfigSchema.extend({
	maxBytes: z.number().int().nonnegative().default(0),
	backupCount: z.number().int().nonnegative().default(0),
});

export type RotatingFileSinkConfig = z.infer<typeof RotatingFileSinkConfigSchema>;

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
		throw err;
	}
}

export class RotatingFileSink extends FileSink {
	override readonly kind: RealSinkKind = 'rotating-file';
	private maxBytes = 0;
	private backupCount = 0;
	private size = 0;

	override async init(config: Record<string, unknown>): Promise<void> {
		const cfg = parseSinkConfig('rotating-file', RotatingFileSinkConfigSchema, config);
		this.maxBytes = cfg.maxBytes;
		this.backupCount = cfg.backupCount;
		await this.open(cfg.filename, cfg.mode, cfg.encoding);
		this.size = cfg.mode === 'w' ? 0 : (await stat(this.path)).size;
	}

	override async write(line: string, _record: LogRecord): Promise<void> {
		const text = `${line}\n`;
		const bytes = Buffer.byteLength(text, this.encoding);
		if (this.shouldRollover(bytes)) await this.rollover();
		await writeLine(await this.writable(), text);
		this.size += bytes;
	}

	private shouldRollover(bytes: number): boolean {
		if (this.maxBytes <= 0 || this.backupCount <= 0) return false;
		return this.size > 0 && this.size + bytes >= this.maxBytes;
	}

	private async rollover(): Promise<void> {
		const stream = this.stream;
		this.stream = null;
		if (stream && !stream.destroyed) await closeStream(stream);

		for (let i = this.backupCount - 1; i >= 1; i--) {
			const from = `${this.path}.${i}`;
			if (await exists(from)) await rename(from, `${this.path}.${i + 1}`);
		}
		await rm(`${this.path}.1`, { force: true });
		await rename(this.path, `${this.path}.1`);

		this.stream = await openStream(this.path, 'w', this.encoding, this.onStreamError);
		this.size = 0;
	}
}
