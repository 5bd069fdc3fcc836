import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { collect, createDocumentSource, loadDocument, readGlobalOptions } from '../config.js';

describe('collect', () => {
	it('appends repeated values in order', () => {
		expect(collect('b', collect('a', []))).toEqual(['a', 'b']);
	});
});

describe('readGlobalOptions', () => {
	it('reads program options from a subcommand', () => {
		const program = new Command()
			.option('-d, --config-dir <dir>', '', collect, [])
			.option('--json')
			.option('-q, --quiet')
			.option('-v, --verbose');
		let seen: ReturnType<typeof readGlobalOptions> | undefined;
		program.command('noop').action((_opts: Record<string, unknown>, cmd: Command) => {
			seen = readGlobalOptions(cmd);
		});

		program.parse(['-d', 'one', '--config-dir', 'two', '--json', 'noop'], { from: 'user' });

		expect(seen).toEqual({ configDir: ['one', 'two'], json: true, quiet: false, verbose: false });
	});
});

describe('loadDocument', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'logrelay-cli-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it('parses a document from a config directory and applies overrides', async () => {
		await writeFile(
			join(tempDir, 'app.yaml'),
			`handlers:
  out:
    class: logging.FileHandler
    filename: logs/app.log
    level: INFO
loggers:
  app:
    handlers: [out]
    level: WARNING
`,
		);
		const source = createDocumentSource({ configDir: [tempDir] });

		const document = await loadDocument(source, 'app', { path: '/var/tmp/other.log', level: 'error' });

		expect(document.sinks).toEqual([
			{ name: 'out', kind: 'file', level: 'error', params: { filename: '/var/tmp/other.log' } },
		]);
		expect(document.loggers).toEqual([{ name: 'app', level: 'debug', sinks: ['out'], propagate: true }]);
	});

	it('still finds the built-in documents', async () => {
		const source = createDocumentSource({ configDir: [tempDir] });
		const document = await loadDocument(source, 'logging_console');

		expect(document.sinks.map((s) => s.kind)).toEqual(['stream']);
	});
});
