/**
 * @logrelay/sink-console — registration entry point.
 */

import type { SinkRegistration } from '@logrelay/sdk';
import { ConsoleSink } from './console-sink.js';

export function register(): SinkRegistration[] {
	return [
		{
			kind: 'stream',
			sink: ConsoleSink,
			description: 'Writes lines to stdout or stderr, optionally coloured by severity.',
		},
	];
}

export { ConsoleSink, type ConsoleSinkConfig, type ConsoleStreams } from './console-sink.js';
