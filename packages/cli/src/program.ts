/**
 * Command-line program — global options and command registration.
 */

import { Command } from 'commander';
import { registerEmitCommand } from './commands/emit.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerListCommand } from './commands/list.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerVersionCommand } from './commands/version.js';
import { collect, readGlobalOptions } from './config.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('logrelay')
		.description('Load, check and exercise queue-relayed logging configurations')
		.option('-d, --config-dir <dir>', 'Directory searched for documents (repeatable)', collect, [])
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.option('-v, --verbose', 'Print extra detail')
		.hook('preAction', (_program, actionCommand) => {
			const { json, quiet, verbose } = readGlobalOptions(actionCommand);
			output.configureOutput({ json, quiet, verbose });
		});

	registerListCommand(program);
	registerInspectCommand(program);
	registerValidateCommand(program);
	registerEmitCommand(program);
	registerVersionCommand(program);

	return program;
}
