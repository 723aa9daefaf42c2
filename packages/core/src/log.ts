export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type LogRecord = {
	kind: "log";
	level: LogLevel;
	component: string;
	message: string;
	ts_ms: number;
	fields: LogFields;
};

export type LogSink = (record: LogRecord) => void;

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export function normalizeLogLevel(value: unknown, fallback: LogLevel = "info"): LogLevel {
	if (typeof value !== "string") {
		return fallback;
	}
	switch (value.trim().toLowerCase()) {
		case "debug":
			return "debug";
		case "info":
			return "info";
		case "warn":
		case "warning":
			return "warn";
		case "error":
			return "error";
		default:
			return fallback;
	}
}

export function errorMessage(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return String(err);
}

export function errorFields(err: unknown): LogFields {
	if (err instanceof Error) {
		return { error: err.message, error_name: err.name };
	}
	return { error: String(err) };
}

export type LoggerOpts = {
	component?: string;
	level?: LogLevel;
	sinks?: readonly LogSink[];
	nowMs?: () => number;
};

/**
 * Structured logger. Records go to every sink synchronously; a sink that throws
 * is reported on stderr and does not affect the caller.
 */
export class Logger {
	readonly #component: string;
	readonly #level: LogLevel;
	readonly #sinks: readonly LogSink[];
	readonly #nowMs: () => number;

	public constructor(opts: LoggerOpts = {}) {
		this.#component = opts.component?.trim() || "dirops";
		this.#level = opts.level ?? "info";
		this.#sinks = [...(opts.sinks ?? [])];
		this.#nowMs = opts.nowMs ?? Date.now;
	}

	public get component(): string {
		return this.#component;
	}

	public get level(): LogLevel {
		return this.#level;
	}

	public child(component: string): Logger {
		return new Logger({
			component: `${this.#component}.${component}`,
			level: this.#level,
			sinks: this.#sinks,
			nowMs: this.#nowMs,
		});
	}

	public enabled(level: LogLevel): boolean {
		return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.#level];
	}

	public log(level: LogLevel, message: string, fields: LogFields = {}): LogRecord | null {
		if (!this.enabled(level)) {
			return null;
		}
		const record: LogRecord = {
			kind: "log",
			level,
			component: this.#component,
			message,
			ts_ms: Math.trunc(this.#nowMs()),
			fields: { ...fields },
		};
		for (const sink of this.#sinks) {
			try {
				sink(record);
			} catch (err) {
				process.stderr.write(`log sink failed: ${errorMessage(err)}\n`);
			}
		}
		return record;
	}

	public debug(message: string, fields?: LogFields): void {
		this.log("debug", message, fields);
	}

	public info(message: string, fields?: LogFields): void {
		this.log("info", message, fields);
	}

	public warn(message: string, fields?: LogFields): void {
		this.log("warn", message, fields);
	}

	public error(message: string, fields?: LogFields): void {
		this.log("error", message, fields);
	}
}

export class MemoryLogSink {
	readonly #records: LogRecord[] = [];

	public readonly write: LogSink = (record) => {
		this.#records.push({ ...record, fields: { ...record.fields } });
	};

	public get records(): readonly LogRecord[] {
		return this.#records;
	}

	public messages(level?: LogLevel): string[] {
		return this.#records.filter((record) => !level || record.level === level).map((record) => record.message);
	}

	public find(message: string): LogRecord[] {
		return this.#records.filter((record) => record.message === message);
	}
}

export function silentLogger(): Logger {
	return new Logger({ sinks: [] });
}
