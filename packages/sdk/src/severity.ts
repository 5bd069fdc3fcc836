/**
 * Severity scale — a total order over named levels.
 *
 * Documents may spell levels by name in any case or by number; both are
 * normalised here so thresholds and minimums compare on one scale.
 */

import type { Severity } from './types.js';

/** Numeric value of each named severity */
export const SEVERITY_VALUES: Readonly<Record<Severity, number>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	critical: 50,
};

/** Upper-case labels used by `%(levelname)s` */
export const SEVERITY_LABELS: Readonly<Record<Severity, string>> = {
	debug: 'DEBUG',
	info: 'INFO',
	warn: 'WARNING',
	error: 'ERROR',
	critical: 'CRITICAL',
};

/** Severities in ascending order */
export const SEVERITIES: readonly Severity[] = ['debug', 'info', 'warn', 'error', 'critical'];

const NAME_ALIASES: Readonly<Record<string, Severity>> = {
	notset: 'debug',
	debug: 'debug',
	info: 'info',
	warn: 'warn',
	warning: 'warn',
	error: 'error',
	critical: 'critical',
	fatal: 'critical',
};

export function isSeverity(value: unknown): value is Severity {
	return typeof value === 'string' && Object.hasOwn(SEVERITY_VALUES, value);
}

/**
 * Normalise a level written by name or number.
 *
 * Numbers map to the highest named level whose value does not exceed them,
 * so 25 is `info` and anything below 10 is `debug`.
 * Returns null when the value cannot be read as a level.
 */
export function parseSeverity(value: unknown): Severity | null {
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) return null;
		let resolved: Severity = 'debug';
		for (const severity of SEVERITIES) {
			if (SEVERITY_VALUES[severity] <= value) resolved = severity;
		}
		return resolved;
	}
	if (typeof value === 'string') {
		const trimmed = value.trim();
		if (/^\d+$/.test(trimmed)) return parseSeverity(Number.parseInt(trimmed, 10));
		const name = trimmed.toLowerCase();
		return Object.hasOwn(NAME_ALIASES, name) ? (NAME_ALIASES[name] ?? null) : null;
	}
	return null;
}

export function severityValue(severity: Severity): number {
	return SEVERITY_VALUES[severity];
}

/** True when `severity` is at or above `threshold`. */
export function meetsThreshold(severity: Severity, threshold: Severity): boolean {
	return SEVERITY_VALUES[severity] >= SEVERITY_VALUES[threshold];
}

/** The more permissive of two severities. */
export function minSeverity(a: Severity, b: Severity): Severity {
	return SEVERITY_VALUES[a] <= SEVERITY_VALUES[b] ? a : b;
}
