/**
 * @logrelay/core — configuration merging and asynchronous record dispatch.
 */

export { SinkAdapter, type SinkAdapterOptions } from './adapter.js';
export {
	type CoordinatorStatus,
	DEFAULT_BOOTSTRAP_IDENTIFIER,
	LoggingCoordinator,
	type LoggingCoordinatorEvents,
	type LoggingCoordinatorOptions,
	type SinkErrorEvent,
	type SinkStatus,
} from './coordinator.js';
export { getDefaultCoordinator, getLogger, initLogging, resetDefaultCoordinator } from './default.js';
export { applyOverrides, normalizeKind, parseDocument } from './document.js';
export {
	type MergeIssue,
	type MergeResult,
	createRelaySinkSpec,
	mergeDocuments,
	resolveSinkKind,
	validateMerge,
} from './merge.js';
export { DispatchQueue, type DispatchQueueOptions, type OverflowPolicy } from './queue.js';
export {
	type DeliveryErrorHandler,
	QueueRelay,
	type QueueRelayOptions,
	type RelayState,
} from './relay.js';
export { LoggerHandle, LoggerRegistry, type RecordDispatcher } from './registry.js';
export {
	BUILTIN_CONFIG_DIR,
	DirectoryDocumentSource,
	type DirectoryDocumentSourceOptions,
	type DocumentSource,
	InMemoryDocumentSource,
	parseDocumentText,
} from './source.js';
export {
	type ProcessHooks,
	TRACE_END_MARKER,
	TRACE_START_MARKER,
	UNCAUGHT_LOGGER_NAME,
	UncaughtFailureHook,
	type UncaughtFailureTarget,
	formatUncaughtMessage,
	isCancellation,
	nodeProcessHooks,
} from './uncaught.js';
