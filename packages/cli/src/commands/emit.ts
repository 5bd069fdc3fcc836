/**
 * logrelay emit — Send one record through a configuration end to end.
 *
 * Loads the documents into a coordinator, logs the message, then shuts the
 * coordinator down so every sink has flushed before the command returns.
 */

import { LoggingCoordinator, type SinkErrorEvent } from '@logrelay/core';
import { type LoadOverrides, parseSeverity } from '@logrelay/sdk';
import type { Command } from 'commander';
import { collect, createDocumentSource, readGlobalOptions } from '../config.js';
import * as output from '../output.js';

interface EmitOptions {
	config: string[];
	level: string;
	logger: string;
	path?: string;
	sinkLevel?: string;
	formatter?: string;
}

export function registerEmitCommand(program: Command): void {
	program
		.command('emit <message...>')
		.description('Log a message through one or more configurations and flush it')
		.option('-c, --config <identifier>', 'Configuration to load (repeatable)', collect, [])
		.option('-l, --level <level>', 'Severity of the record', 'info')
		.option('-n, --logger <name>', 'Logger name', 'logrelay.cli')
		.option('-p, --path <file>', 'Replace the filename of every file sink')
		.option('--sink-level <level>', 'Threshold for every sink')
		.option('-f, --formatter <name>', 'Formatter for every sink')
		.action(async (words: string[], opts: EmitOptions, cmd: Command) => {
			const globals = readGlobalOptions(cmd);
			const severity = parseSeverity(opts.level);
			if (severity === null) {
				output.error(`Unknown level "${opts.level}"`);
				process.exitCode = 1;
				return;
			}

			const identifiers = opts.config.length > 0 ? opts.config : ['logging_console'];
			const overrides: LoadOverrides = {};
			if (opts.path !== undefined) overrides.path = opts.path;
			if (opts.sinkLevel !== undefined) overrides.level = opts.sinkLevel;
			if (opts.formatter !== undefined) overrides.formatter = opts.formatter;

			const coordinator = new LoggingCoordinator({
				source: createDocumentSource(globals),
				autoBootstrap: false,
				processHooks: false,
			});
			const failures: string[] = [];
			coordinator.on('sink-error', (event: SinkErrorEvent) => {
				failures.push(
					`${event.sink}: ${event.error instanceof Error ? event.error.message : String(event.error)}`,
				);
			});

			try {
				await coordinator.loadMany(identifiers.map((identifier) => ({ identifier, overrides })));
				output.verbose(`Loaded ${identifiers.join(', ')}`);

				const message = words.join(' ');
				const logger = coordinator.getLogger(opts.logger);
				const enabled = logger.isEnabledFor(severity);
				logger.log(severity, message);
				const sinks = coordinator.status().sinks;

				const spin = output.spinner('Flushing sinks');
				await coordinator.shutdown();
				spin.stop();

				if (output.isJsonMode()) {
					output.json({
						logger: opts.logger,
						severity,
						message,
						enabled,
						configs: identifiers,
						sinks: sinks.map((s) => ({ name: s.name, kind: s.kind, threshold: s.threshold })),
						failures,
					});
				} else if (!enabled) {
					output.warn(`Logger "${opts.logger}" does not accept ${severity} records`);
				} else {
					output.success(`Logged ${output.severity(severity)} record to ${sinks.length} sink(s)`);
				}
				for (const failure of failures) output.error(failure);
				if (failures.length > 0) process.exitCode = 1;
			} catch (err) {
				await coordinator.shutdown();
				output.error(`Emit failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
