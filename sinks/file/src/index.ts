/**
 * @logrelay/sink-file — registration entry point.
 */

import type { SinkRegistration } from '@logrelay/sdk';
import { FileSink } from './file-sink.js';
import { RotatingFileSink } from './rotating-file-sink.js';

export function register(): SinkRegistration[] {
	return [
		{
			kind: 'file',
			sink: FileSink,
			description: 'Appends lines to a file, creating its directory if needed.',
		},
		{
			kind: 'rotating-file',
			sink: RotatingFileSink,
			description: 'Appends lines to a file and rotates it at maxBytes, keeping backupCount backups.',
		},
	];
}

export { FileSink, type FileSinkConfig } from './file-sink.js';
export { RotatingFileSink, type RotatingFileSinkConfig } from './rotating-file-sink.js';
