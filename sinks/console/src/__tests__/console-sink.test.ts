/**
 * Tests for ConsoleSink — stream selection, colour and config validation.
 */

import { Writable } from 'node:stream';
import { InvalidConfigurationFormatError, createTestRecord } from '@logrelay/sdk';
import { ConsoleSink } from '../console-sink.js';
import { register } from '../index.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

function collector() {
	const chunks: string[] = [];
	const stream = new Writable({
		write(chunk, _encoding, callback) {
			chunks.push(String(chunk));
			callback();
		},
	});
	return { stream, chunks };
}

function makeSink() {
	const stdout = collector();
	const stderr = collector();
	const sink = new ConsoleSink({ stdout: stdout.stream, stderr: stderr.stream });
	return { sink, stdout: stdout.chunks, stderr: stderr.chunks };
}

// ─── ConsoleSink ─────────────────────────────────────────────────────────────

describe('ConsoleSink', () => {
	it('writes to stderr by default', async () => {
		const { sink, stdout, stderr } = makeSink();
		await sink.init({});
		await sink.write('hello', createTestRecord());

		expect(stderr).toEqual(['hello\n']);
		expect(stdout).toEqual([]);
	});

	it('honours ext://sys.stdout', async () => {
		const { sink, stdout, stderr } = makeSink();
		await sink.init({ stream: 'ext://sys.stdout' });
		await sink.write('to stdout', createTestRecord());

		expect(stdout).toEqual(['to stdout\n']);
		expect(stderr).toEqual([]);
	});

	it('accepts the short stream names', async () => {
		const { sink, stdout } = makeSink();
		await sink.init({ stream: 'stdout' });
		await sink.write('short', createTestRecord());

		expect(stdout).toEqual(['short\n']);
	});

	it('writes lines in order', async () => {
		const { sink, stderr } = makeSink();
		await sink.init({});
		for (const message of ['one', 'two', 'three']) {
			await sink.write(message, createTestRecord({ message }));
		}

		expect(stderr).toEqual(['one\n', 'two\n', 'three\n']);
	});

	it('colours lines by severity when enabled', async () => {
		const { sink, stderr } = makeSink();
		await sink.init({ color: true });
		await sink.write('bad', createTestRecord({ severity: 'error' }));
		await sink.write('careful', createTestRecord({ severity: 'warn' }));
		await sink.write('fine', createTestRecord({ severity: 'info' }));

		expect(stderr).toEqual(['\x1b[31mbad\x1b[39m\n', '\x1b[33mcareful\x1b[39m\n', 'fine\n']);
	});

	it('does not colour by default', async () => {
		const { sink, stderr } = makeSink();
		await sink.init({});
		await sink.write('bad', createTestRecord({ severity: 'error' }));

		expect(stderr).toEqual(['bad\n']);
	});

	it('ignores unrelated handler fields', async () => {
		const { sink } = makeSink();
		await expect(sink.init({ stream: 'stdout', encoding: 'utf-8' })).resolves.toBeUndefined();
	});

	it('rejects an unknown stream', async () => {
		const { sink } = makeSink();
		await expect(sink.init({ stream: 'ext://sys.stdin' })).rejects.toBeInstanceOf(
			InvalidConfigurationFormatError,
		);
	});

	it('rejects a non-boolean color flag', async () => {
		const { sink } = makeSink();
		await expect(sink.init({ color: 'yes' })).rejects.toThrow('Invalid configuration "stream sink"');
	});
});

describe('register', () => {
	it('registers the stream kind', () => {
		const [registration] = register();
		expect(registration?.kind).toBe('stream');
		expect(registration?.sink).toBe(ConsoleSink);
	});
});
