import { shortId } from "@dirops/core";
import type { Identity } from "@dirops/directory";
import type { IntentKind } from "./intent.js";

export type PendingAction = {
	kind: IntentKind;
	target_query: string;
	requested_by: string;
	/** Run time for deactivations; null means "use the default time". */
	scheduled_for_ms: number | null;
	source: "chat" | "mail";
};

type DisambiguationSession = {
	token: string;
	pending: PendingAction;
	candidates: Identity[];
	created_at_ms: number;
	expires_at_ms: number | null;
};

export type SessionResolveDecision =
	| { kind: "resolved"; pending: PendingAction; identity: Identity }
	| { kind: "not_found"; reason: "unknown_token" | "expired" | "unknown_candidate" };

export type DisambiguationSessionsOpts = {
	/** Null disables expiry. */
	ttlMs?: number | null;
	nowMs?: () => number;
	tokenFactory?: () => string;
};

export const DEFAULT_SESSION_TTL_MS = 15 * 60_000;

function clonePending(pending: PendingAction): PendingAction {
	return { ...pending };
}

/**
 * Short-lived choice state for ambiguous requests. Tokens are single use: any
 * lookup removes the session, whatever its outcome.
 */
export class DisambiguationSessions {
	readonly #sessions = new Map<string, DisambiguationSession>();
	readonly #ttlMs: number | null;
	readonly #nowMs: () => number;
	readonly #tokenFactory: () => string;

	public constructor(opts: DisambiguationSessionsOpts = {}) {
		this.#ttlMs = opts.ttlMs === null ? null : Math.max(1_000, Math.trunc(opts.ttlMs ?? DEFAULT_SESSION_TTL_MS));
		this.#nowMs = opts.nowMs ?? Date.now;
		this.#tokenFactory = opts.tokenFactory ?? shortId;
	}

	public get size(): number {
		return this.#sessions.size;
	}

	public open(pending: PendingAction, candidates: readonly Identity[]): string {
		if (candidates.length < 2) {
			throw new Error("disambiguation requires at least two candidates");
		}
		// Abandoned selections are dropped here; only `open` grows the table.
		this.sweepExpired();
		let token = this.#tokenFactory();
		while (this.#sessions.has(token)) {
			token = this.#tokenFactory();
		}
		const nowMs = Math.trunc(this.#nowMs());
		this.#sessions.set(token, {
			token,
			pending: clonePending(pending),
			candidates: candidates.map((identity) => ({ ...identity })),
			created_at_ms: nowMs,
			expires_at_ms: this.#ttlMs == null ? null : nowMs + this.#ttlMs,
		});
		return token;
	}

	public candidates(token: string): Identity[] {
		return this.#sessions.get(token)?.candidates.map((identity) => ({ ...identity })) ?? [];
	}

	public resolve(token: string, handle: string): SessionResolveDecision {
		const session = this.#sessions.get(token);
		if (!session) {
			return { kind: "not_found", reason: "unknown_token" };
		}
		this.#sessions.delete(token);
		if (session.expires_at_ms != null && Math.trunc(this.#nowMs()) >= session.expires_at_ms) {
			return { kind: "not_found", reason: "expired" };
		}
		const wanted = handle.trim().toLowerCase();
		const identity = session.candidates.find((candidate) => candidate.handle.toLowerCase() === wanted);
		if (!identity) {
			return { kind: "not_found", reason: "unknown_candidate" };
		}
		return { kind: "resolved", pending: clonePending(session.pending), identity: { ...identity } };
	}

	public cancel(token: string): boolean {
		return this.#sessions.delete(token);
	}

	public sweepExpired(): number {
		const nowMs = Math.trunc(this.#nowMs());
		let removed = 0;
		for (const [token, session] of this.#sessions) {
			if (session.expires_at_ms != null && nowMs >= session.expires_at_ms) {
				this.#sessions.delete(token);
				removed += 1;
			}
		}
		return removed;
	}
}
