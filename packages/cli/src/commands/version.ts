/**
 * logrelay version — Print version info.
 */

import { readFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { z } from 'zod';
import * as output from '../output.js';

const PackageSchema = z.object({ version: z.string() });

export async function getVersion(): Promise<string> {
	try {
		const content = await readFile(new URL('../../package.json', import.meta.url), 'utf-8');
		return PackageSchema.parse(JSON.parse(content)).version;
	} catch {
		return 'unknown';
	}
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print version info')
		.action(async () => {
			const version = await getVersion();

			if (output.isJsonMode()) {
				output.json({
					logrelay: version,
					node: process.version,
					platform: `${process.platform} ${process.arch}`,
				});
				return;
			}

			output.info(`logrelay ${version}`);
			output.info(`node     ${process.version}`);
			output.info(`platform ${process.platform} ${process.arch}`);
		});
}
