import { createReadStream } from "node:fs";
import { mkdir, open, rename, stat } from "node:fs/promises";
import { dirname, join, parse as parsePath } from "node:path";
import { createInterface } from "node:readline";
import type { JsonlStore } from "../persistence.js";

function tmpPathFor(path: string): string {
	const parsed = parsePath(path);
	const nonce = `${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
	return join(parsed.dir, `${parsed.base}.${nonce}.tmp`);
}

function isErrnoCode(err: unknown, code: string): boolean {
	return err instanceof Error && "code" in err && err.code === code;
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (isErrnoCode(err, "ENOENT")) {
			return false;
		}
		throw err;
	}
}

export class JsonlParseError extends SyntaxError {
	public readonly filePath: string;
	public readonly lineNumber: number;
	public readonly rawLine: string;

	public constructor(opts: { filePath: string; lineNumber: number; rawLine: string; cause: unknown }) {
		const causeMessage = opts.cause instanceof Error ? opts.cause.message : String(opts.cause);
		super(`invalid jsonl row at ${opts.filePath}:${opts.lineNumber}: ${causeMessage}`, {
			cause: opts.cause,
		});
		this.name = "JsonlParseError";
		this.filePath = opts.filePath;
		this.lineNumber = opts.lineNumber;
		this.rawLine = opts.rawLine;
	}
}

/** Marker row yielded in lenient mode for a line that is not valid JSON. */
export type JsonlUnparsedLine = {
	kind: "jsonl.unparsed";
	line_number: number;
	raw: string;
	error: string;
};

export function isJsonlUnparsedLine(value: unknown): value is JsonlUnparsedLine {
	return (
		typeof value === "object" &&
		value !== null &&
		"kind" in value &&
		value.kind === "jsonl.unparsed" &&
		"line_number" in value &&
		typeof value.line_number === "number"
	);
}

export type ReadJsonlOpts = {
	/** Yield a `JsonlUnparsedLine` for broken lines instead of throwing. */
	lenient?: boolean;
};

export async function* streamJsonl(path: string, opts: ReadJsonlOpts = {}): AsyncGenerator<unknown> {
	if (!(await exists(path))) {
		return;
	}

	const file = createReadStream(path, { encoding: "utf8" });
	const rl = createInterface({ input: file, crlfDelay: Number.POSITIVE_INFINITY });
	let lineNumber = 0;
	try {
		for await (const line of rl) {
			lineNumber += 1;
			const trimmed = line.trim();
			if (trimmed.length === 0) {
				continue;
			}
			let row: unknown;
			try {
				row = JSON.parse(trimmed);
			} catch (error) {
				if (opts.lenient) {
					const unparsed: JsonlUnparsedLine = {
						kind: "jsonl.unparsed",
						line_number: lineNumber,
						raw: trimmed,
						error: error instanceof Error ? error.message : String(error),
					};
					yield unparsed;
					continue;
				}
				throw new JsonlParseError({
					filePath: path,
					lineNumber,
					rawLine: trimmed,
					cause: error,
				});
			}
			yield row;
		}
	} finally {
		rl.close();
		file.close();
	}
}

export async function readJsonl(path: string, opts: ReadJsonlOpts = {}): Promise<unknown[]> {
	const rows: unknown[] = [];
	for await (const row of streamJsonl(path, opts)) {
		rows.push(row);
	}
	return rows;
}

export async function writeJsonl(path: string, rows: readonly unknown[]): Promise<void> {
	await mkdir(dirname(path), { recursive: true });

	const tmp = tmpPathFor(path);
	const out = rows.map((row) => `${JSON.stringify(row)}\n`).join("");
	const fh = await open(tmp, "w");
	try {
		await fh.writeFile(out, { encoding: "utf8" });
		await fh.sync();
	} finally {
		await fh.close();
	}
	await rename(tmp, path);
}

export type AppendJsonlOpts = {
	/** fsync before resolving. Defaults to true. */
	durable?: boolean;
};

export async function appendJsonl(path: string, row: unknown, opts: AppendJsonlOpts = {}): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	const line = `${JSON.stringify(row)}\n`;

	const fh = await open(path, "a");
	try {
		await fh.writeFile(line, { encoding: "utf8" });
		if (opts.durable ?? true) {
			await fh.sync();
		}
	} finally {
		await fh.close();
	}
}

export class FsJsonlStore implements JsonlStore<unknown> {
	public readonly path: string;
	readonly #lenient: boolean;

	public constructor(path: string, opts: { lenient?: boolean } = {}) {
		this.path = path;
		this.#lenient = opts.lenient ?? false;
	}

	public async read(): Promise<unknown[]> {
		return await readJsonl(this.path, { lenient: this.#lenient });
	}

	public async write(rows: readonly unknown[]): Promise<void> {
		await writeJsonl(this.path, rows);
	}

	public async append(row: unknown): Promise<void> {
		await appendJsonl(this.path, row);
	}
}
