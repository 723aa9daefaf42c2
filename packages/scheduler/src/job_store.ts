import { formatZonedIso, type JsonlStore, parseTimestampMs, SerializedMutationExecutor } from "@dirops/core";
import { FsJsonlStore, isJsonlUnparsedLine } from "@dirops/core/node";
import { z } from "zod";
import { PersistenceFailureError } from "./errors.js";
import { assertValidJobTransition, type JobStatus, JobStatusSchema, type JobType, JobTypeSchema } from "./job_state.js";

export const JobRecordSchema = z.object({
	v: z.literal(1),
	job_id: z.number().int().positive(),
	job_type: JobTypeSchema,
	target_handle: z.string().min(1),
	/** ISO-8601 with UTC offset. */
	run_at: z.string().min(1),
	status: JobStatusSchema,
	/** Principal id, or "system" for automated sources. */
	created_by: z.string().min(1),
	metadata: z.record(z.string(), z.string()),
	created_at_ms: z.number().int(),
	updated_at_ms: z.number().int(),
	finished_at_ms: z.number().int().nullable(),
	failure_reason: z.string().nullable(),
	revision: z.number().int().positive(),
});
export type JobRecord = z.infer<typeof JobRecordSchema>;

export type JobLoadIssue = {
	line: number;
	job_id: number | null;
	reason: string;
};

export type CreateJobOpts = {
	targetHandle: string;
	runAtMs: number;
	createdBy: string;
	jobType?: JobType;
	metadata?: Record<string, string>;
};

export type CreateJobDecision =
	| { kind: "created"; job: JobRecord }
	| { kind: "replaced"; job: JobRecord; previous: JobRecord };

export type JobTransitionDecision =
	| { kind: "updated"; job: JobRecord }
	| { kind: "noop"; reason: "not_found" | "not_scheduled" | "in_flight"; job: JobRecord | null };

export type JobClaimDecision =
	| { kind: "claimed"; job: JobRecord }
	| { kind: "rejected"; reason: "not_found" | "not_scheduled" | "in_flight"; job: JobRecord | null };

export type DurableJobStoreOpts = {
	path?: string;
	store?: JsonlStore<unknown>;
	timeZone?: string;
	nowMs?: () => number;
};

export const SYSTEM_PRINCIPAL = "system";

function defaultNowMs(): number {
	return Date.now();
}

function cloneJob(job: JobRecord): JobRecord {
	return { ...job, metadata: { ...job.metadata } };
}

export function jobRunAtMs(job: JobRecord): number | null {
	return parseTimestampMs(job.run_at);
}

function dedupeKey(handle: string, runAt: string): string {
	const runAtMs = parseTimestampMs(runAt);
	return `${handle.trim().toLowerCase()}@${runAtMs ?? runAt}`;
}

function compareByRunAt(a: JobRecord, b: JobRecord): number {
	const aMs = jobRunAtMs(a) ?? Number.POSITIVE_INFINITY;
	const bMs = jobRunAtMs(b) ?? Number.POSITIVE_INFINITY;
	if (aMs !== bMs) {
		return aMs < bMs ? -1 : 1;
	}
	return a.job_id - b.job_id;
}

function chooseLatest(a: JobRecord, b: JobRecord): JobRecord {
	if (a.revision !== b.revision) {
		return a.revision > b.revision ? a : b;
	}
	return a.updated_at_ms >= b.updated_at_ms ? a : b;
}

function rawJobId(row: unknown): number | null {
	if (typeof row === "object" && row !== null && "job_id" in row && typeof row.job_id === "number") {
		return Number.isInteger(row.job_id) ? row.job_id : null;
	}
	return null;
}

/**
 * Durable job table. Every mutation appends a full job snapshot; on load the
 * highest revision per job id wins. Mutations are serialized and only touch
 * memory after the append has resolved.
 */
export class DurableJobStore {
	readonly #store: JsonlStore<unknown>;
	readonly #timeZone: string;
	readonly #nowMs: () => number;
	readonly #jobsById = new Map<number, JobRecord>();
	readonly #liveIdByKey = new Map<string, number>();
	readonly #inFlight = new Set<number>();
	#issues: JobLoadIssue[] = [];
	#maxJobId = 0;
	#loaded: Promise<void> | null = null;
	readonly #mutations = new SerializedMutationExecutor();

	public constructor(opts: DurableJobStoreOpts) {
		if (!opts.store && !opts.path) {
			throw new Error("job store requires a path or a store");
		}
		this.#store = opts.store ?? new FsJsonlStore(opts.path ?? "", { lenient: true });
		this.#timeZone = opts.timeZone ?? "UTC";
		this.#nowMs = opts.nowMs ?? defaultNowMs;
	}

	async #ensureLoaded(): Promise<void> {
		if (!this.#loaded) {
			this.#loaded = this.#load();
		}
		await this.#loaded;
	}

	async #load(): Promise<void> {
		let rows: unknown[];
		try {
			rows = await this.#store.read();
		} catch (err) {
			this.#loaded = null;
			throw new PersistenceFailureError("job store load", err);
		}
		const byId = new Map<number, JobRecord>();
		const issues: JobLoadIssue[] = [];
		let maxJobId = 0;
		rows.forEach((row, index) => {
			if (isJsonlUnparsedLine(row)) {
				issues.push({ line: row.line_number, job_id: null, reason: `unreadable row: ${row.error}` });
				return;
			}
			const idHint = rawJobId(row);
			if (idHint != null) {
				maxJobId = Math.max(maxJobId, idHint);
			}
			const parsed = JobRecordSchema.safeParse(row);
			if (!parsed.success) {
				const detail = parsed.error.issues
					.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
					.join("; ");
				issues.push({ line: index + 1, job_id: idHint, reason: `invalid job row: ${detail}` });
				return;
			}
			const existing = byId.get(parsed.data.job_id);
			byId.set(parsed.data.job_id, existing ? chooseLatest(existing, parsed.data) : parsed.data);
		});

		this.#jobsById.clear();
		for (const job of byId.values()) {
			this.#jobsById.set(job.job_id, job);
		}
		this.#issues = issues;
		this.#maxJobId = maxJobId;
		this.#rebuildIndexes();
	}

	#rebuildIndexes(): void {
		this.#liveIdByKey.clear();
		for (const job of this.#jobsById.values()) {
			if (job.status === "scheduled") {
				this.#liveIdByKey.set(dedupeKey(job.target_handle, job.run_at), job.job_id);
			}
		}
	}

	async #commit(operation: string, next: JobRecord): Promise<JobRecord> {
		const row = JobRecordSchema.parse(next);
		try {
			await this.#store.append(row);
		} catch (err) {
			throw new PersistenceFailureError(operation, err);
		}
		this.#jobsById.set(row.job_id, row);
		this.#maxJobId = Math.max(this.#maxJobId, row.job_id);
		this.#rebuildIndexes();
		return cloneJob(row);
	}

	public get timeZone(): string {
		return this.#timeZone;
	}

	public async load(): Promise<void> {
		await this.#ensureLoaded();
	}

	/** Rows that could not be read on load. They are kept out of every listing. */
	public async loadIssues(): Promise<JobLoadIssue[]> {
		await this.#ensureLoaded();
		return this.#issues.map((issue) => ({ ...issue }));
	}

	public async get(jobId: number): Promise<JobRecord | null> {
		await this.#ensureLoaded();
		const job = this.#jobsById.get(jobId);
		return job ? cloneJob(job) : null;
	}

	public async list(opts: { status?: JobStatus | null } = {}): Promise<JobRecord[]> {
		await this.#ensureLoaded();
		return [...this.#jobsById.values()]
			.filter((job) => !opts.status || job.status === opts.status)
			.sort(compareByRunAt)
			.map(cloneJob);
	}

	/** Scheduled jobs in ascending run_at; rows with an unparsable run_at sort last. */
	public async listScheduled(): Promise<JobRecord[]> {
		return await this.list({ status: "scheduled" });
	}

	public isInFlight(jobId: number): boolean {
		return this.#inFlight.has(jobId);
	}

	/**
	 * Creates a scheduled job, or replaces the live scheduled job with the same
	 * (target handle, run_at) pair. Resolves only after the row is durable.
	 */
	public async createJob(opts: CreateJobOpts): Promise<CreateJobDecision> {
		return await this.#mutations.run(async (): Promise<CreateJobDecision> => {
			await this.#ensureLoaded();
			const targetHandle = opts.targetHandle.trim();
			if (!targetHandle) {
				throw new Error("job_target_handle_required");
			}
			if (!Number.isFinite(opts.runAtMs)) {
				throw new Error("job_run_at_invalid");
			}
			const createdBy = opts.createdBy.trim() || SYSTEM_PRINCIPAL;
			// run_at carries whole seconds; sub-second input shares its second's key.
			const runAt = formatZonedIso(Math.floor(opts.runAtMs / 1000) * 1000, this.#timeZone);
			const nowMs = Math.trunc(this.#nowMs());

			const liveId = this.#liveIdByKey.get(dedupeKey(targetHandle, runAt));
			const live = liveId != null ? this.#jobsById.get(liveId) : undefined;
			if (live) {
				const job = await this.#commit("job replace", {
					...live,
					created_by: createdBy,
					metadata: { ...live.metadata, ...(opts.metadata ?? {}) },
					updated_at_ms: nowMs,
					revision: live.revision + 1,
				});
				return { kind: "replaced", job, previous: cloneJob(live) };
			}

			const job = await this.#commit("job create", {
				v: 1,
				job_id: this.#maxJobId + 1,
				job_type: opts.jobType ?? "disable_account",
				target_handle: targetHandle,
				run_at: runAt,
				status: "scheduled",
				created_by: createdBy,
				metadata: { ...(opts.metadata ?? {}) },
				created_at_ms: nowMs,
				updated_at_ms: nowMs,
				finished_at_ms: null,
				failure_reason: null,
				revision: 1,
			});
			return { kind: "created", job };
		});
	}

	async #finish(
		jobId: number,
		to: "done" | "failed",
		opts: { reason?: string | null; allowInFlight: boolean },
	): Promise<JobTransitionDecision> {
		return await this.#mutations.run(async (): Promise<JobTransitionDecision> => {
			await this.#ensureLoaded();
			const current = this.#jobsById.get(jobId);
			if (!current) {
				return { kind: "noop", reason: "not_found", job: null };
			}
			if (current.status !== "scheduled") {
				return { kind: "noop", reason: "not_scheduled", job: cloneJob(current) };
			}
			if (!opts.allowInFlight && this.#inFlight.has(jobId)) {
				return { kind: "noop", reason: "in_flight", job: cloneJob(current) };
			}
			assertValidJobTransition(current.status, to);
			const nowMs = Math.trunc(this.#nowMs());
			const job = await this.#commit(`job ${to}`, {
				...current,
				status: to,
				updated_at_ms: nowMs,
				finished_at_ms: nowMs,
				failure_reason: to === "failed" ? (opts.reason?.trim() || "unknown failure") : null,
				revision: current.revision + 1,
			});
			return { kind: "updated", job };
		});
	}

	/** No-op unless the job is scheduled. */
	public async markDone(jobId: number): Promise<JobTransitionDecision> {
		return await this.#finish(jobId, "done", { allowInFlight: true });
	}

	/** No-op unless the job is scheduled. */
	public async markFailed(jobId: number, reason: string): Promise<JobTransitionDecision> {
		return await this.#finish(jobId, "failed", { reason, allowInFlight: true });
	}

	/** Operator override: fails a scheduled job unless its action is already running. */
	public async cancel(jobId: number, reason: string): Promise<JobTransitionDecision> {
		return await this.#finish(jobId, "failed", { reason, allowInFlight: false });
	}

	/**
	 * Marks a scheduled job as in flight so no second execution can start. The
	 * marker lives in memory only and is cleared by `release`.
	 */
	public async claim(jobId: number): Promise<JobClaimDecision> {
		return await this.#mutations.run(async (): Promise<JobClaimDecision> => {
			await this.#ensureLoaded();
			const current = this.#jobsById.get(jobId);
			if (!current) {
				return { kind: "rejected", reason: "not_found", job: null };
			}
			if (current.status !== "scheduled") {
				return { kind: "rejected", reason: "not_scheduled", job: cloneJob(current) };
			}
			if (this.#inFlight.has(jobId)) {
				return { kind: "rejected", reason: "in_flight", job: cloneJob(current) };
			}
			this.#inFlight.add(jobId);
			return { kind: "claimed", job: cloneJob(current) };
		});
	}

	public release(jobId: number): void {
		this.#inFlight.delete(jobId);
	}
}
