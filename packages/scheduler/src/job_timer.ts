import { errorFields, type Logger, silentLogger } from "@dirops/core";

type JobTimerEntry = {
	jobId: number;
	dueAtMs: number;
	handle: ReturnType<typeof setTimeout> | null;
	token: number;
	onDue: () => void | Promise<void>;
};

export type JobTimerSnapshot = {
	job_id: number;
	due_at_ms: number;
};

export type JobTimerRegistryOpts = {
	nowMs?: () => number;
	maxDelayMs?: number;
	logger?: Logger;
};

const DEFAULT_MAX_DELAY_MS = 60_000;

function defaultNowMs(): number {
	return Date.now();
}

/**
 * One-shot timers keyed by job id. Arming an id that is already armed replaces
 * its timer. Delays longer than `maxDelayMs` are split into chunks and re-checked
 * against the clock, so far-future and wall-clock-shifted due times stay exact.
 */
export class JobTimerRegistry {
	readonly #entries = new Map<number, JobTimerEntry>();
	readonly #running = new Set<Promise<void>>();
	readonly #nowMs: () => number;
	readonly #maxDelayMs: number;
	readonly #logger: Logger;
	#token = 0;

	public constructor(opts: JobTimerRegistryOpts = {}) {
		this.#nowMs = opts.nowMs ?? defaultNowMs;
		this.#maxDelayMs = Math.max(1_000, Math.trunc(opts.maxDelayMs ?? DEFAULT_MAX_DELAY_MS));
		this.#logger = opts.logger ?? silentLogger();
	}

	#clearTimer(entry: JobTimerEntry): void {
		if (entry.handle) {
			clearTimeout(entry.handle);
		}
		entry.handle = null;
	}

	#arm(entry: JobTimerEntry): void {
		this.#clearTimer(entry);
		const nowMs = Math.trunc(this.#nowMs());
		const remainingMs = Math.max(0, entry.dueAtMs - nowMs);
		const delayMs = Math.min(this.#maxDelayMs, remainingMs);
		const token = ++this.#token;
		entry.token = token;
		entry.handle = setTimeout(() => {
			this.#onTimer(entry.jobId, token);
		}, delayMs);
		entry.handle.unref?.();
	}

	#onTimer(jobId: number, token: number): void {
		const entry = this.#entries.get(jobId);
		if (!entry || entry.token !== token) {
			return;
		}

		const nowMs = Math.trunc(this.#nowMs());
		if (nowMs < entry.dueAtMs) {
			this.#arm(entry);
			return;
		}

		this.#clearTimer(entry);
		this.#entries.delete(jobId);
		const run: Promise<void> = Promise.resolve()
			.then(entry.onDue)
			.catch((err: unknown) => {
				this.#logger.error("job timer callback failed", { job_id: jobId, ...errorFields(err) });
			})
			.finally(() => {
				this.#running.delete(run);
			});
		this.#running.add(run);
	}

	public arm(opts: { jobId: number; dueAtMs: number; onDue: () => void | Promise<void> }): void {
		const dueAtMs = Math.max(0, Math.trunc(opts.dueAtMs));
		const existing = this.#entries.get(opts.jobId);
		const entry: JobTimerEntry = existing ?? {
			jobId: opts.jobId,
			dueAtMs,
			handle: null,
			token: 0,
			onDue: opts.onDue,
		};
		entry.dueAtMs = dueAtMs;
		entry.onDue = opts.onDue;
		this.#entries.set(opts.jobId, entry);
		this.#arm(entry);
	}

	public disarm(jobId: number): boolean {
		const entry = this.#entries.get(jobId);
		if (!entry) {
			return false;
		}
		this.#clearTimer(entry);
		this.#entries.delete(jobId);
		return true;
	}

	public has(jobId: number): boolean {
		return this.#entries.has(jobId);
	}

	public dueAt(jobId: number): number | null {
		return this.#entries.get(jobId)?.dueAtMs ?? null;
	}

	public get size(): number {
		return this.#entries.size;
	}

	public list(): JobTimerSnapshot[] {
		return [...this.#entries.values()]
			.map((entry) => ({
				job_id: entry.jobId,
				due_at_ms: entry.dueAtMs,
			}))
			.sort((a, b) => {
				if (a.due_at_ms !== b.due_at_ms) {
					return a.due_at_ms - b.due_at_ms;
				}
				return a.job_id - b.job_id;
			});
	}

	/** Resolves once every callback that has fired so far has settled. */
	public async idle(): Promise<void> {
		while (this.#running.size > 0) {
			await Promise.allSettled([...this.#running]);
		}
	}

	public stop(): void {
		for (const entry of this.#entries.values()) {
			this.#clearTimer(entry);
		}
		this.#entries.clear();
	}
}
