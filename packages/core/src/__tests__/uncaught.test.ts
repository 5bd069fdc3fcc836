import type { LogRecord } from '@logrelay/sdk';
import { describe, expect, it, vi } from 'vitest';
import { LoggerRegistry } from '../registry.js';
import {
	TRACE_END_MARKER,
	TRACE_START_MARKER,
	UNCAUGHT_LOGGER_NAME,
	UncaughtFailureHook,
	type UncaughtFailureTarget,
	formatUncaughtMessage,
	isCancellation,
} from '../uncaught.js';
import { FakeProcess } from './helpers.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

function makeTarget() {
	const records: LogRecord[] = [];
	const registry = new LoggerRegistry((record) => records.push(record));
	const target = {
		getLogger: (name: string) => registry.getLogger(name),
		flush: vi.fn(async () => {}),
		shutdown: vi.fn(async () => {}),
	} satisfies UncaughtFailureTarget;
	return { records, target };
}

function abortError(): Error {
	const error = new Error('The operation was aborted');
	error.name = 'AbortError';
	return error;
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('isCancellation', () => {
	it('recognises AbortError by name', () => {
		expect(isCancellation(abortError())).toBe(true);
		expect(isCancellation(new Error('x'))).toBe(false);
		expect(isCancellation('AbortError')).toBe(false);
	});
});

describe('formatUncaughtMessage', () => {
	it('wraps the trace in the delimiter lines', () => {
		expect(formatUncaughtMessage('oops')).toBe(
			`${TRACE_START_MARKER}\nNon-error value thrown: oops\n${TRACE_END_MARKER}`,
		);
	});
});

describe('UncaughtFailureHook', () => {
	it('installs once and uninstalls', () => {
		const fake = new FakeProcess();
		const hook = new UncaughtFailureHook(makeTarget().target, fake);
		hook.install();
		hook.install();

		expect(fake.uncaught).toHaveLength(1);
		expect(fake.beforeExit).toHaveLength(1);

		hook.uninstall();
		expect(fake.uncaught).toHaveLength(0);
		expect(hook.installed).toBe(false);
	});

	it('logs one critical record, flushes, then exits with status 1', async () => {
		const fake = new FakeProcess();
		const { records, target } = makeTarget();
		const hook = new UncaughtFailureHook(target, fake);
		const failure = new Error('boom');

		await hook.handle(failure);

		expect(records).toHaveLength(1);
		expect(records[0].severity).toBe('critical');
		expect(records[0].logger).toBe(UNCAUGHT_LOGGER_NAME);
		expect(records[0].message).toBe(`${TRACE_START_MARKER}\n${failure.stack}\n${TRACE_END_MARKER}`);
		expect(target.flush).toHaveBeenCalledTimes(1);
		expect(fake.stderr).toEqual([`${failure.stack}\n`]);
		expect(fake.exitCodes).toEqual([1]);
	});

	it('runs only the default behaviour for a cancellation', async () => {
		const fake = new FakeProcess();
		const { records, target } = makeTarget();
		const hook = new UncaughtFailureHook(target, fake);

		await hook.handle(abortError());

		expect(records).toEqual([]);
		expect(target.flush).not.toHaveBeenCalled();
		expect(fake.exitCodes).toEqual([1]);
	});

	it('does not log a second failure raised while handling the first', async () => {
		const fake = new FakeProcess();
		const { records, target } = makeTarget();
		let release: () => void = () => {};
		target.flush.mockImplementationOnce(
			() =>
				new Promise<void>((resolve) => {
					release = () => resolve();
				}),
		);
		const hook = new UncaughtFailureHook(target, fake);

		const first = hook.handle(new Error('first'));
		await hook.handle(new Error('second'));
		release();
		await first;

		expect(records).toHaveLength(1);
		expect(fake.exitCodes).toEqual([1, 1]);
	});

	it('still exits when logging fails', async () => {
		const fake = new FakeProcess();
		const { target } = makeTarget();
		target.flush.mockRejectedValueOnce(new Error('flush failed'));
		const hook = new UncaughtFailureHook(target, fake);

		await hook.handle(new Error('boom'));

		expect(fake.stderr[0]).toBe('[logrelay] could not log uncaught failure: flush failed\n');
		expect(fake.exitCodes).toEqual([1]);
	});

	it('handles failures delivered through the process listener', async () => {
		const fake = new FakeProcess();
		const { records, target } = makeTarget();
		new UncaughtFailureHook(target, fake).install();

		fake.uncaught[0](new Error('from process'));
		await vi.waitFor(() => expect(fake.exitCodes).toEqual([1]));
		expect(records).toHaveLength(1);
	});

	it('shuts the target down once on beforeExit', async () => {
		const fake = new FakeProcess();
		const { target } = makeTarget();
		const hook = new UncaughtFailureHook(target, fake);
		hook.install();

		fake.beforeExit[0]();
		await hook.handleBeforeExit();

		expect(target.shutdown).toHaveBeenCalledTimes(1);
	});
});
