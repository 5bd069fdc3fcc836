/**
 * Shared fakes for the core tests.
 */

import type { ProcessHooks } from '../uncaught.js';

/** ProcessHooks that record listeners, stderr output and exit codes. */
export class FakeProcess implements ProcessHooks {
	uncaught: Array<(failure: unknown) => void> = [];
	beforeExit: Array<() => void> = [];
	stderr: string[] = [];
	exitCodes: number[] = [];

	onUncaught(listener: (failure: unknown) => void): () => void {
		this.uncaught.push(listener);
		return () => {
			this.uncaught = this.uncaught.filter((l) => l !== listener);
		};
	}

	onBeforeExit(listener: () => void): () => void {
		this.beforeExit.push(listener);
		return () => {
			this.beforeExit = this.beforeExit.filter((l) => l !== listener);
		};
	}

	writeStderr(text: string): void {
		this.stderr.push(text);
	}

	exit(code: number): void {
		this.exitCodes.push(code);
	}
}
