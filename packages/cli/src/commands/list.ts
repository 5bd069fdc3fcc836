/**
 * logrelay list — Show the available configuration documents or sink kinds.
 */

import { register as registerConsoleSinks } from '@logrelay/sink-console';
import { register as registerFileSinks } from '@logrelay/sink-file';
import type { Command } from 'commander';
import { createDocumentSource, readGlobalOptions } from '../config.js';
import * as output from '../output.js';

function listSinkKinds(): void {
	const rows = [...registerConsoleSinks(), ...registerFileSinks()].map((registration) => ({
		kind: registration.kind,
		description: registration.description,
	}));
	output.table(
		[
			{ header: 'KIND', key: 'kind' },
			{ header: 'DESCRIPTION', key: 'description' },
		],
		rows,
	);
}

export function registerListCommand(program: Command): void {
	program
		.command('list')
		.description('List available configuration documents')
		.option('--sinks', 'List sink kinds instead')
		.action(async (opts: { sinks?: boolean }, cmd: Command) => {
			if (opts.sinks) {
				listSinkKinds();
				return;
			}

			try {
				const source = createDocumentSource(readGlobalOptions(cmd));
				const identifiers = await source.list();
				const rows = await Promise.all(
					identifiers.map(async (identifier) => ({
						identifier,
						path: (await source.locate(identifier)) ?? '',
					})),
				);

				if (rows.length === 0 && !output.isJsonMode()) {
					output.warn(`No documents found in ${source.directories.join(', ')}`);
					return;
				}
				output.table(
					[
						{ header: 'IDENTIFIER', key: 'identifier' },
						{ header: 'PATH', key: 'path' },
					],
					rows,
				);
			} catch (err) {
				output.error(`List failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
