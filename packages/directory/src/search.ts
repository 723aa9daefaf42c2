import { readFile } from "node:fs/promises";
import { z } from "zod";
import { normalizeForMatch } from "./fuzzy.js";
import { type Identity, IdentitySchema } from "./models.js";
import { buildSearchScript, MAX_SEARCH_RESULTS, parseSearchOutput, type ScriptRunner } from "./powershell.js";

/**
 * Raw directory search: identities whose display name, canonical name or handle
 * loosely contain the query, unranked. May throw.
 */
export interface IdentitySearch {
	search(query: string): Promise<Identity[]>;
}

export class DirectorySearchError extends Error {
	public readonly exitCode: number | null;

	public constructor(message: string, opts: { exitCode?: number | null; cause?: unknown } = {}) {
		super(message, { cause: opts.cause });
		this.name = "DirectorySearchError";
		this.exitCode = opts.exitCode ?? null;
	}
}

export class PowerShellIdentitySearch implements IdentitySearch {
	readonly #runner: ScriptRunner;
	readonly #searchBase: string;
	readonly #maxResults: number;

	public constructor(opts: { runner: ScriptRunner; searchBase: string; maxResults?: number }) {
		this.#runner = opts.runner;
		this.#searchBase = opts.searchBase;
		this.#maxResults = Math.max(1, Math.trunc(opts.maxResults ?? MAX_SEARCH_RESULTS));
	}

	public async search(query: string): Promise<Identity[]> {
		const result = await this.#runner(buildSearchScript(query, this.#searchBase, this.#maxResults));
		if (result.timedOut) {
			throw new DirectorySearchError("directory search timed out");
		}
		if (result.exitCode !== 0) {
			const detail = result.stderr.trim().split("\n")[0] ?? "";
			throw new DirectorySearchError(`directory search failed: ${detail || `exit ${result.exitCode}`}`, {
				exitCode: result.exitCode,
			});
		}
		try {
			return parseSearchOutput(result.stdout, this.#maxResults);
		} catch (err) {
			throw new DirectorySearchError("directory search returned malformed output", { cause: err });
		}
	}
}

function commonName(path: string): string {
	const match = /^CN=([^,]+)/i.exec(path.trim());
	return match?.[1] ?? "";
}

/** In-process directory used by the no-op backend and by tests. */
export class StaticIdentitySearch implements IdentitySearch {
	readonly #identities: readonly Identity[];

	public constructor(identities: readonly Identity[]) {
		this.#identities = identities.map((identity) => ({ ...identity }));
	}

	public get size(): number {
		return this.#identities.length;
	}

	public async search(query: string): Promise<Identity[]> {
		const q = normalizeForMatch(query);
		if (!q) {
			return [];
		}
		return this.#identities
			.filter((identity) =>
				[identity.display_name, identity.handle, commonName(identity.path)].some((field) =>
					normalizeForMatch(field).includes(q),
				),
			)
			.map((identity) => ({ ...identity }));
	}
}

const IdentityFixtureSchema = z.array(IdentitySchema);

export async function loadIdentityFixture(path: string): Promise<Identity[]> {
	const raw = await readFile(path, "utf8");
	const parsed: unknown = JSON.parse(raw);
	return IdentityFixtureSchema.parse(parsed);
}
