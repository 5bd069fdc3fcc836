/**
 * Sink adapter — one concrete sink plus its threshold and formatter.
 *
 * The relay hands every dequeued record to every adapter; the adapter decides
 * whether the record passes its threshold and renders the line the sink writes.
 */

import {
	type LogRecord,
	type RealSinkKind,
	type RecordFormatter,
	type Severity,
	type Sink,
	meetsThreshold,
} from '@logrelay/sdk';

export interface SinkAdapterOptions {
	name: string;
	kind: RealSinkKind;
	sink: Sink;
	formatter: RecordFormatter;
	/** Records below this severity are skipped (default: debug) */
	threshold?: Severity;
	/** Identity of the document that declared the sink */
	source?: string;
}

export class SinkAdapter {
	readonly name: string;
	readonly kind: RealSinkKind;
	readonly sink: Sink;
	readonly formatter: RecordFormatter;
	readonly threshold: Severity;
	readonly source?: string;

	constructor(options: SinkAdapterOptions) {
		this.name = options.name;
		this.kind = options.kind;
		this.sink = options.sink;
		this.formatter = options.formatter;
		this.threshold = options.threshold ?? 'debug';
		this.source = options.source;
	}

	accepts(record: LogRecord): boolean {
		return meetsThreshold(record.severity, this.threshold);
	}

	/**
	 * Format and write a record if it passes the threshold.
	 * @returns whether the record was written
	 */
	async handle(record: LogRecord): Promise<boolean> {
		if (!this.accepts(record)) return false;
		await this.sink.write(this.formatter.format(record), record);
		return true;
	}

	async flush(): Promise<void> {
		await this.sink.flush();
	}

	async shutdown(): Promise<void> {
		await this.sink.shutdown();
	}
}
