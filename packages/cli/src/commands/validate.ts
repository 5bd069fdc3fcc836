/**
 * logrelay validate — Check that documents parse and merge into an
 * applicable configuration, without opening any sink.
 */

import { mergeDocuments, validateMerge } from '@logrelay/core';
import type { LoadedDocument } from '@logrelay/sdk';
import type { Command } from 'commander';
import { createDocumentSource, loadDocument, readGlobalOptions } from '../config.js';
import * as output from '../output.js';

export interface ValidationReport {
	identifier: string;
	valid: boolean;
	errors: string[];
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function registerValidateCommand(program: Command): void {
	program
		.command('validate <identifiers...>')
		.description('Parse and merge configurations, reporting every problem')
		.action(async (identifiers: string[], _opts: Record<string, unknown>, cmd: Command) => {
			const source = createDocumentSource(readGlobalOptions(cmd));
			const reports: ValidationReport[] = [];
			const documents: LoadedDocument[] = [];

			for (const identifier of identifiers) {
				try {
					const document = await loadDocument(source, identifier);
					documents.push(document);
					reports.push({ identifier, valid: true, errors: [] });
					output.check(
						identifier,
						true,
						`${document.sinks.length} sink(s), ${document.loggers.length} logger(s)`,
					);
				} catch (err) {
					reports.push({ identifier, valid: false, errors: [describe(err)] });
					output.check(identifier, false, describe(err));
				}
			}

			const issues = validateMerge(mergeDocuments(documents)).map((issue) => issue.message);
			if (documents.length > 1 || issues.length > 0) {
				if (issues.length === 0) {
					output.check('merged', true, `${documents.length} document(s) merge cleanly`);
				}
				for (const issue of issues) output.check('merged', false, issue);
			}

			const valid = reports.every((r) => r.valid) && issues.length === 0;
			if (output.isJsonMode()) {
				output.json({ valid, documents: reports, mergeErrors: issues });
			}
			if (!valid) process.exitCode = 1;
		});
}
