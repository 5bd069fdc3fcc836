/**
 * CLI configuration — global options and document loading.
 *
 * Documents are looked up in every --config-dir (in order), then
 * LOGRELAY_CONFIG_DIR, then the built-in documents.
 */

import { DirectoryDocumentSource, applyOverrides, parseDocument } from '@logrelay/core';
import type { LoadOverrides, LoadedDocument } from '@logrelay/sdk';
import type { Command } from 'commander';
import { z } from 'zod';

const GlobalOptionsSchema = z.object({
	configDir: z.array(z.string()).default([]),
	json: z.boolean().default(false),
	quiet: z.boolean().default(false),
	verbose: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** Read the program-level options as seen from any (sub)command. */
export function readGlobalOptions(command: Command): GlobalOptions {
	const result = GlobalOptionsSchema.safeParse(command.optsWithGlobals());
	if (result.success) return result.data;
	return GlobalOptionsSchema.parse({});
}

export function createDocumentSource(options: Pick<GlobalOptions, 'configDir'>): DirectoryDocumentSource {
	return new DirectoryDocumentSource(options.configDir);
}

/**
 * Resolve, parse and (optionally) override one document, the same way the
 * coordinator does on load.
 */
export async function loadDocument(
	source: DirectoryDocumentSource,
	identifier: string,
	overrides?: LoadOverrides,
): Promise<LoadedDocument> {
	const tree = await source.resolve(identifier);
	return applyOverrides(parseDocument(identifier, tree), overrides);
}

/** Collect a repeatable option into an array */
export function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}
