/**
 * Convenience default coordinator, created by an explicit initLogging() call.
 */

import { NotConfiguredError } from '@logrelay/sdk';
import { LoggingCoordinator, type LoggingCoordinatorOptions } from './coordinator.js';
import type { LoggerHandle } from './registry.js';

let defaultCoordinator: LoggingCoordinator | null = null;

/**
 * Create the default coordinator. Calling it again returns the existing one;
 * options only apply to the first call.
 */
export function initLogging(options?: LoggingCoordinatorOptions): LoggingCoordinator {
	defaultCoordinator ??= new LoggingCoordinator(options);
	return defaultCoordinator;
}

/** @throws NotConfiguredError before initLogging() */
export function getDefaultCoordinator(): LoggingCoordinator {
	if (!defaultCoordinator) throw new NotConfiguredError('call initLogging() first');
	return defaultCoordinator;
}

export function getLogger(name: string): LoggerHandle {
	return getDefaultCoordinator().getLogger(name);
}

/** Shut down and forget the default coordinator. */
export async function resetDefaultCoordinator(): Promise<void> {
	const coordinator = defaultCoordinator;
	defaultCoordinator = null;
	await coordinator?.shutdown();
}
