/**
 * logrelay inspect — Show what a single configuration document declares.
 */

import type { LoadedDocument } from '@logrelay/sdk';
import type { Command } from 'commander';
import { createDocumentSource, loadDocument, readGlobalOptions } from '../config.js';
import * as output from '../output.js';

function formatParams(params: Record<string, unknown>): string {
	const entries = Object.entries(params).map(([k, v]) =>
		typeof v === 'object' && v !== null ? `${k}=${JSON.stringify(v)}` : `${k}=${String(v)}`,
	);
	return entries.join(', ') || '(none)';
}

function printDocument(document: LoadedDocument, path: string | null): void {
	output.heading(`Configuration ${document.identity}`);
	if (path) output.field('File', path);

	output.subheading('Formatters');
	if (document.formatters.length === 0) output.field('-', '(none)');
	for (const [name, formatter] of document.formatters) {
		output.field(name, formatter.format ?? '%(message)s');
	}

	output.subheading('Sinks');
	if (document.sinks.length === 0) output.field('-', '(none)');
	for (const sink of document.sinks) {
		const parts = [sink.kind, `level=${output.severity(sink.level ?? 'debug')}`];
		if (sink.formatter) parts.push(`formatter=${sink.formatter}`);
		output.field(sink.name, parts.join(' '));
		if (Object.keys(sink.params).length > 0) output.field('', formatParams(sink.params));
	}

	output.subheading('Loggers');
	if (document.loggers.length === 0) output.field('-', '(none)');
	for (const logger of document.loggers) {
		const propagation = logger.propagate ? '' : ' (propagate: false)';
		output.field(
			logger.name || '(root)',
			`${output.severity(logger.level)} -> ${logger.sinks.join(', ') || '(none)'}${propagation}`,
		);
	}
}

export function registerInspectCommand(program: Command): void {
	program
		.command('inspect <identifier>')
		.description('Show the formatters, sinks and loggers of a configuration')
		.action(async (identifier: string, _opts: Record<string, unknown>, cmd: Command) => {
			try {
				const source = createDocumentSource(readGlobalOptions(cmd));
				const document = await loadDocument(source, identifier);

				if (output.isJsonMode()) {
					output.json(document);
					return;
				}
				printDocument(document, await source.locate(identifier));
			} catch (err) {
				output.error(`Inspect failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
