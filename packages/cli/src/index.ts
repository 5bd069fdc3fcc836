#!/usr/bin/env node
/**
 * logrelay CLI entry point.
 */

import { createProgram } from './program.js';
import * as output from './output.js';

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		output.error(err instanceof Error ? err.message : String(err));
		process.exitCode = 1;
	});
