export type MatchTier = "exact" | "prefix" | "fuzzy";

export type FieldMatch = {
	score: number;
	tier: MatchTier;
};

export function normalizeForMatch(value: string): string {
	return value.toLowerCase().replaceAll("ё", "е").replace(/\s+/g, " ").trim();
}

export function levenshtein(a: string, b: string): number {
	if (a === b) {
		return 0;
	}
	if (a.length === 0) {
		return b.length;
	}
	if (b.length === 0) {
		return a.length;
	}
	let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
	let curr = new Array<number>(b.length + 1).fill(0);
	for (let i = 1; i <= a.length; i += 1) {
		curr[0] = i;
		for (let j = 1; j <= b.length; j += 1) {
			const cost = a.charAt(i - 1) === b.charAt(j - 1) ? 0 : 1;
			const deletion = (prev[j] ?? 0) + 1;
			const insertion = (curr[j - 1] ?? 0) + 1;
			const substitution = (prev[j - 1] ?? 0) + cost;
			curr[j] = Math.min(deletion, insertion, substitution);
		}
		[prev, curr] = [curr, prev];
	}
	return prev[b.length] ?? Math.max(a.length, b.length);
}

/** 0..100, where 100 means identical. */
export function similarity(a: string, b: string): number {
	const longest = Math.max(a.length, b.length);
	if (longest === 0) {
		return 100;
	}
	return 100 * (1 - levenshtein(a, b) / longest);
}

/** Best similarity of `shorter` against any equally long window of `longer`. */
export function partialSimilarity(shorter: string, longer: string): number {
	if (shorter.length === 0) {
		return 0;
	}
	if (longer.includes(shorter)) {
		return 100;
	}
	if (shorter.length >= longer.length) {
		return similarity(shorter, longer);
	}
	let best = 0;
	for (let start = 0; start + shorter.length <= longer.length; start += 1) {
		best = Math.max(best, similarity(shorter, longer.slice(start, start + shorter.length)));
		if (best === 100) {
			break;
		}
	}
	return best;
}

function sortedTokens(value: string): string {
	return value
		.split(" ")
		.filter((token) => token.length > 0)
		.sort()
		.join(" ");
}

export function tokenSortSimilarity(a: string, b: string): number {
	return similarity(sortedTokens(a), sortedTokens(b));
}

/**
 * Weighted blend of plain, token-sorted and partial similarity. Partial matches
 * are discounted more the more the two lengths differ.
 */
export function weightedSimilarity(a: string, b: string): number {
	if (a.length === 0 || b.length === 0) {
		return 0;
	}
	const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
	const base = similarity(a, b);
	const tokenSort = tokenSortSimilarity(a, b) * 0.95;
	const lengthRatio = longer.length / shorter.length;
	if (lengthRatio < 1.5) {
		return Math.max(base, tokenSort);
	}
	const partialScale = lengthRatio < 8 ? 0.9 : 0.6;
	const partial = partialSimilarity(shorter, longer) * partialScale;
	return Math.max(base, tokenSort * partialScale, partial);
}

const PREFIX_FLOOR = 90;
const FUZZY_SCALE = 0.89;

/**
 * Scores one normalized field against a normalized query. Exact matches score
 * 100, prefix matches (whole field or any word) 90..100, everything else
 * stays below 90.
 */
export function scoreField(query: string, field: string): FieldMatch {
	if (query.length === 0 || field.length === 0) {
		return { score: 0, tier: "fuzzy" };
	}
	if (query === field) {
		return { score: 100, tier: "exact" };
	}
	const words = field.split(" ");
	if (field.startsWith(query) || words.some((word) => word.startsWith(query))) {
		const coverage = Math.min(1, query.length / field.length);
		return { score: Math.min(99.99, PREFIX_FLOOR + 10 * coverage), tier: "prefix" };
	}
	return { score: weightedSimilarity(query, field) * FUZZY_SCALE, tier: "fuzzy" };
}
