export { randomHex, shortId } from "./ids.js";
export type { LogFields, LoggerOpts, LogLevel, LogRecord, LogSink } from "./log.js";
export { errorFields, errorMessage, Logger, MemoryLogSink, normalizeLogLevel, silentLogger } from "./log.js";
export type { JsonlStore } from "./persistence.js";
export { InMemoryJsonlStore } from "./persistence.js";
export { SerializedMutationExecutor } from "./serialized_mutation_executor.js";
export type { CalendarDate, ZonedDateTimeParts } from "./time.js";
export {
	addCalendarDays,
	atZonedTime,
	formatCalendarDate,
	formatZonedIso,
	isValidCalendarDate,
	parseTimestampMs,
	resolveTimeZone,
	timeZoneOffsetMs,
	zonedCalendarDate,
	zonedDateTimeParts,
	zonedTimeToUtcMs,
} from "./time.js";
