export type { AppendJsonlOpts, JsonlUnparsedLine, ReadJsonlOpts } from "./jsonl.js";
export {
	appendJsonl,
	FsJsonlStore,
	isJsonlUnparsedLine,
	JsonlParseError,
	readJsonl,
	streamJsonl,
	writeJsonl,
} from "./jsonl.js";
export type { LineWriter } from "./log_sinks.js";
export { consoleLogSink, formatLogLine, JsonlLogSink } from "./log_sinks.js";
export type { StorePaths } from "./store.js";
export { getDiropsHomeDir, getStorePaths } from "./store.js";
export type { AcquireSchedulerLockOpts, SchedulerLockHolder } from "./scheduler_lock.js";
export { processIsAlive, SchedulerLock, SchedulerLockBusyError, SchedulerLockHolderSchema } from "./scheduler_lock.js";

// Re-export the fs-free surface so node code can import from a single place.
export * from "../index.js";
