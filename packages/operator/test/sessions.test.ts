import type { Identity } from "@dirops/directory";
import { DisambiguationSessions, type PendingAction } from "@dirops/operator";
import { describe, expect, test } from "vitest";

const PENDING: PendingAction = {
	kind: "disable_account",
	target_query: "Ivanova",
	requested_by: "100",
	scheduled_for_ms: null,
	source: "chat",
};

function identity(handle: string, displayName: string): Identity {
	return { handle, display_name: displayName, path: `CN=${displayName},OU=Staff,DC=corp,DC=local`, enabled: true };
}

const CANDIDATES = [identity("n.ivanova", "Ivanova N."), identity("m.ivanova", "Ivanova M.")];

function sequentialTokens(...tokens: string[]): () => string {
	let index = 0;
	return () => tokens[index++] ?? `ffff${String(index).padStart(4, "0")}`;
}

describe("DisambiguationSessions", () => {
	test("a token resolves once", () => {
		const sessions = new DisambiguationSessions({ tokenFactory: sequentialTokens("0000aaaa") });
		const token = sessions.open(PENDING, CANDIDATES);

		expect(token).toBe("0000aaaa");
		expect(sessions.candidates(token).map((candidate) => candidate.handle)).toEqual(["n.ivanova", "m.ivanova"]);
		expect(sessions.resolve(token, "M.Ivanova")).toEqual({
			kind: "resolved",
			pending: PENDING,
			identity: CANDIDATES[1],
		});
		expect(sessions.resolve(token, "m.ivanova")).toEqual({ kind: "not_found", reason: "unknown_token" });
		expect(sessions.size).toBe(0);
	});

	test("a handle outside the candidate list consumes the token", () => {
		const sessions = new DisambiguationSessions();
		const token = sessions.open(PENDING, CANDIDATES);

		expect(sessions.resolve(token, "someone.else")).toEqual({ kind: "not_found", reason: "unknown_candidate" });
		expect(sessions.resolve(token, "n.ivanova")).toEqual({ kind: "not_found", reason: "unknown_token" });
	});

	test("tokens expire after the ttl", () => {
		let now = 1_000;
		const sessions = new DisambiguationSessions({ ttlMs: 60_000, nowMs: () => now });
		const token = sessions.open(PENDING, CANDIDATES);

		now += 60_000;
		expect(sessions.resolve(token, "n.ivanova")).toEqual({ kind: "not_found", reason: "expired" });
	});

	test("a null ttl disables expiry", () => {
		let now = 0;
		const sessions = new DisambiguationSessions({ ttlMs: null, nowMs: () => now });
		const token = sessions.open(PENDING, CANDIDATES);

		now += 365 * 24 * 60 * 60 * 1_000;
		expect(sessions.sweepExpired()).toBe(0);
		expect(sessions.resolve(token, "n.ivanova").kind).toBe("resolved");
	});

	test("sweepExpired drops only stale sessions", () => {
		let now = 0;
		const sessions = new DisambiguationSessions({ ttlMs: 10_000, nowMs: () => now });
		sessions.open(PENDING, CANDIDATES);
		now = 5_000;
		const fresh = sessions.open(PENDING, CANDIDATES);
		now = 10_000;

		expect(sessions.sweepExpired()).toBe(1);
		expect(sessions.size).toBe(1);
		expect(sessions.candidates(fresh)).toHaveLength(2);
	});

	test("opening a session drops abandoned ones", () => {
		let now = 0;
		const sessions = new DisambiguationSessions({
			ttlMs: 10_000,
			nowMs: () => now,
			tokenFactory: sequentialTokens("0000aaaa", "0000bbbb", "0000cccc"),
		});
		sessions.open(PENDING, CANDIDATES);
		sessions.open(PENDING, CANDIDATES);
		expect(sessions.size).toBe(2);

		now = 10_000;
		expect(sessions.open(PENDING, CANDIDATES)).toBe("0000cccc");
		expect(sessions.size).toBe(1);
		expect(sessions.candidates("0000aaaa")).toEqual([]);
	});

	test("colliding tokens are regenerated", () => {
		const sessions = new DisambiguationSessions({ tokenFactory: sequentialTokens("0000aaaa", "0000aaaa", "0000bbbb") });

		expect(sessions.open(PENDING, CANDIDATES)).toBe("0000aaaa");
		expect(sessions.open(PENDING, CANDIDATES)).toBe("0000bbbb");
	});

	test("cancel drops the session", () => {
		const sessions = new DisambiguationSessions();
		const token = sessions.open(PENDING, CANDIDATES);

		expect(sessions.cancel(token)).toBe(true);
		expect(sessions.cancel(token)).toBe(false);
		expect(sessions.resolve(token, "n.ivanova")).toEqual({ kind: "not_found", reason: "unknown_token" });
	});

	test("fewer than two candidates is a caller error", () => {
		const sessions = new DisambiguationSessions();
		expect(() => sessions.open(PENDING, CANDIDATES.slice(0, 1))).toThrow(
			"disambiguation requires at least two candidates",
		);
	});
});
