import chalk from "chalk";
import type { LogLevel, LogRecord, LogSink } from "../log.js";
import { errorMessage } from "../log.js";
import { appendJsonl } from "./jsonl.js";

const LEVEL_LABEL: Record<LogLevel, string> = {
	debug: chalk.gray("DEBUG"),
	info: chalk.cyan("INFO "),
	warn: chalk.yellow("WARN "),
	error: chalk.red("ERROR"),
};

function formatFieldValue(value: unknown): string {
	if (typeof value === "string") {
		return /\s/.test(value) ? JSON.stringify(value) : value;
	}
	if (value === undefined) {
		return "undefined";
	}
	return JSON.stringify(value) ?? String(value);
}

export function formatLogLine(record: LogRecord): string {
	const ts = new Date(record.ts_ms).toISOString();
	const fields = Object.entries(record.fields)
		.map(([key, value]) => `${chalk.dim(`${key}=`)}${formatFieldValue(value)}`)
		.join(" ");
	const head = `${chalk.dim(ts)} ${LEVEL_LABEL[record.level]} ${chalk.magenta(record.component)} ${record.message}`;
	return fields.length > 0 ? `${head} ${fields}` : head;
}

export type LineWriter = {
	write(chunk: string): unknown;
};

/** Human-readable sink; warnings and errors go to stderr. */
export function consoleLogSink(opts: { stdout?: LineWriter; stderr?: LineWriter } = {}): LogSink {
	const stdout = opts.stdout ?? process.stdout;
	const stderr = opts.stderr ?? process.stderr;
	return (record) => {
		const out = record.level === "warn" || record.level === "error" ? stderr : stdout;
		out.write(`${formatLogLine(record)}\n`);
	};
}

/**
 * Appends records to a JSONL file in arrival order. Writes are queued on a
 * promise tail; `flush` waits for the queue to drain.
 */
export class JsonlLogSink {
	readonly #path: string;
	#tail: Promise<void> = Promise.resolve();

	public constructor(path: string) {
		this.#path = path;
	}

	public get path(): string {
		return this.#path;
	}

	public readonly write: LogSink = (record) => {
		this.#tail = this.#tail
			.then(async () => await appendJsonl(this.#path, record, { durable: false }))
			.catch((err: unknown) => {
				process.stderr.write(`log file write failed (${this.#path}): ${errorMessage(err)}\n`);
			});
	};

	public async flush(): Promise<void> {
		await this.#tail;
	}
}
