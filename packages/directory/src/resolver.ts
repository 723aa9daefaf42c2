import { errorFields, type Logger, silentLogger } from "@dirops/core";
import { type MatchTier, normalizeForMatch, scoreField } from "./fuzzy.js";
import type { Identity } from "./models.js";
import type { IdentitySearch } from "./search.js";

export const DEFAULT_CANDIDATE_LIMIT = 10;

export type RankedIdentity = {
	identity: Identity;
	score: number;
	tier: MatchTier;
};

function bestFieldMatch(query: string, identity: Identity): { score: number; tier: MatchTier } {
	const fields = [identity.display_name, identity.handle, `${identity.display_name} (${identity.handle})`];
	let best: { score: number; tier: MatchTier } = { score: 0, tier: "fuzzy" };
	for (const raw of fields) {
		const match = scoreField(query, normalizeForMatch(raw));
		if (match.score > best.score) {
			best = match;
		}
	}
	return best;
}

/**
 * Ranks identities by descending score. Equal scores keep the input order, so
 * the raw search's ordering breaks ties.
 */
export function rankIdentities(query: string, identities: readonly Identity[]): RankedIdentity[] {
	const q = normalizeForMatch(query);
	return identities
		.map((identity, index) => ({ identity, index, ...bestFieldMatch(q, identity) }))
		.sort((a, b) => {
			if (a.score !== b.score) {
				return b.score - a.score;
			}
			return a.index - b.index;
		})
		.map(({ identity, score, tier }) => ({ identity: { ...identity }, score, tier }));
}

export type IdentityResolverOpts = {
	search: IdentitySearch;
	logger?: Logger;
	defaultLimit?: number;
};

export class IdentityResolver {
	readonly #search: IdentitySearch;
	readonly #logger: Logger;
	readonly #defaultLimit: number;

	public constructor(opts: IdentityResolverOpts) {
		this.#search = opts.search;
		this.#logger = opts.logger ?? silentLogger();
		this.#defaultLimit = Math.max(1, Math.trunc(opts.defaultLimit ?? DEFAULT_CANDIDATE_LIMIT));
	}

	public rank(query: string, identities: readonly Identity[]): RankedIdentity[] {
		return rankIdentities(query, identities);
	}

	/** Candidate set for `query`; empty when nothing matches or the search fails. */
	public async resolve(query: string, limit: number = this.#defaultLimit): Promise<Identity[]> {
		const trimmed = query.trim();
		if (!trimmed) {
			return [];
		}
		let raw: Identity[];
		try {
			raw = await this.#search.search(trimmed);
		} catch (err) {
			this.#logger.error("identity search failed", { query: trimmed, ...errorFields(err) });
			return [];
		}
		const max = Math.max(1, Math.trunc(limit));
		const ranked = rankIdentities(trimmed, raw).slice(0, max);
		this.#logger.debug("identity query resolved", {
			query: trimmed,
			raw_count: raw.length,
			candidates: ranked.map((entry) => entry.identity.handle),
		});
		return ranked.map((entry) => entry.identity);
	}
}
