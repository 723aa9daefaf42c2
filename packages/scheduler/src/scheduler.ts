import { type Logger, silentLogger } from "@dirops/core";
import { SchedulerNotReadyError } from "./errors.js";
import type { JobExecutor } from "./executor.js";
import {
	type CreateJobDecision,
	type DurableJobStore,
	type JobRecord,
	type JobTransitionDecision,
	jobRunAtMs,
} from "./job_store.js";
import { JobTimerRegistry, type JobTimerSnapshot } from "./job_timer.js";

export type ScheduleJobOpts = {
	targetHandle: string;
	runAtMs: number;
	createdBy: string;
	metadata?: Record<string, string>;
};

export type ScheduleDecision = CreateJobDecision & { due_at_ms: number };

export type JobSchedulerOpts = {
	store: DurableJobStore;
	executor: JobExecutor;
	timers?: JobTimerRegistry;
	logger?: Logger;
};

export const OPERATOR_CANCEL_REASON = "cancelled_by_operator";

/**
 * Owns the timer queue. Submissions are refused until `open` is called, which
 * the runtime does once recovery has re-armed the persisted jobs.
 */
export class JobScheduler {
	readonly #store: DurableJobStore;
	readonly #executor: JobExecutor;
	readonly #timers: JobTimerRegistry;
	readonly #logger: Logger;
	#accepting = false;

	public constructor(opts: JobSchedulerOpts) {
		this.#store = opts.store;
		this.#executor = opts.executor;
		this.#logger = opts.logger ?? silentLogger();
		this.#timers = opts.timers ?? new JobTimerRegistry({ logger: this.#logger });
	}

	public get accepting(): boolean {
		return this.#accepting;
	}

	public open(): void {
		this.#accepting = true;
	}

	/** Persists the job, then arms its timer. Nothing is armed if the write fails. */
	public async schedule(opts: ScheduleJobOpts): Promise<ScheduleDecision> {
		if (!this.#accepting) {
			throw new SchedulerNotReadyError();
		}
		const decision = await this.#store.createJob({
			targetHandle: opts.targetHandle,
			runAtMs: opts.runAtMs,
			createdBy: opts.createdBy,
			metadata: opts.metadata,
		});
		// Armed from the stored run_at so the due time matches what recovery would use.
		const dueAtMs = jobRunAtMs(decision.job) ?? Math.floor(opts.runAtMs / 1000) * 1000;
		this.arm(decision.job, dueAtMs);
		this.#logger.info(decision.kind === "created" ? "job scheduled" : "job rescheduled", {
			job_id: decision.job.job_id,
			target: decision.job.target_handle,
			run_at: decision.job.run_at,
			created_by: decision.job.created_by,
		});
		return { ...decision, due_at_ms: dueAtMs };
	}

	/**
	 * Arms (or re-arms) the timer for a job. `dueAtMs` defaults to the job's
	 * run_at; returns false when neither yields a usable time.
	 */
	public arm(job: JobRecord, dueAtMs: number | null = jobRunAtMs(job)): boolean {
		if (dueAtMs == null || !Number.isFinite(dueAtMs)) {
			return false;
		}
		const jobId = job.job_id;
		this.#timers.arm({
			jobId,
			dueAtMs,
			onDue: async () => {
				await this.#executor.execute(jobId);
			},
		});
		return true;
	}

	public disarm(jobId: number): boolean {
		return this.#timers.disarm(jobId);
	}

	public armed(): JobTimerSnapshot[] {
		return this.#timers.list();
	}

	/** Operator override: marks a scheduled job failed and drops its timer. */
	public async cancel(jobId: number, actor: string): Promise<JobTransitionDecision> {
		const decision = await this.#store.cancel(jobId, OPERATOR_CANCEL_REASON);
		if (decision.kind === "updated") {
			this.#timers.disarm(jobId);
			this.#logger.info("job cancelled", { job_id: jobId, actor });
		}
		return decision;
	}

	/** Resolves once every job execution started by a timer has settled. */
	public async idle(): Promise<void> {
		await this.#timers.idle();
	}

	public stop(): void {
		this.#accepting = false;
		this.#timers.stop();
	}
}
