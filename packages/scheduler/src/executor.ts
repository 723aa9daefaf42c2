import { errorFields, errorMessage, type Logger, silentLogger } from "@dirops/core";
import type { ActionExecutor, ActionResult, DirectoryAction } from "@dirops/directory";
import type { AuditLog } from "./audit_log.js";
import type { DurableJobStore, JobRecord } from "./job_store.js";

export const DEFAULT_ACTION_TIMEOUT_MS = 120_000;

export type JobExecutionOutcome =
	| { kind: "done"; job: JobRecord; output: string }
	| { kind: "failed"; job: JobRecord; reason: string }
	| { kind: "skipped"; job_id: number; reason: "not_found" | "not_scheduled" | "in_flight" }
	| { kind: "error"; job_id: number; reason: string };

export type JobExecutorOpts = {
	store: DurableJobStore;
	actions: ActionExecutor;
	audit: AuditLog;
	logger?: Logger;
	actionTimeoutMs?: number;
};

function actionForJob(job: JobRecord): DirectoryAction {
	switch (job.job_type) {
		case "disable_account":
			return { kind: "disable_account", handle: job.target_handle };
	}
}

/**
 * Runs one due job: claim, external action under a timeout, terminal status,
 * audit entry. Never rejects; every failure ends up in the returned outcome.
 */
export class JobExecutor {
	readonly #store: DurableJobStore;
	readonly #actions: ActionExecutor;
	readonly #audit: AuditLog;
	readonly #logger: Logger;
	readonly #actionTimeoutMs: number;

	public constructor(opts: JobExecutorOpts) {
		this.#store = opts.store;
		this.#actions = opts.actions;
		this.#audit = opts.audit;
		this.#logger = opts.logger ?? silentLogger();
		this.#actionTimeoutMs = Math.max(1, Math.trunc(opts.actionTimeoutMs ?? DEFAULT_ACTION_TIMEOUT_MS));
	}

	async #performWithTimeout(action: DirectoryAction): Promise<ActionResult> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<ActionResult>((resolve) => {
			timer = setTimeout(() => {
				resolve({ ok: false, reason: `action timed out after ${this.#actionTimeoutMs}ms` });
			}, this.#actionTimeoutMs);
		});
		const attempt = Promise.resolve()
			.then(async () => await this.#actions.performAction(action))
			.catch((err: unknown): ActionResult => ({ ok: false, reason: errorMessage(err) }));
		try {
			return await Promise.race([attempt, timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	public async execute(jobId: number): Promise<JobExecutionOutcome> {
		let job: JobRecord;
		try {
			const claim = await this.#store.claim(jobId);
			if (claim.kind !== "claimed") {
				this.#logger.debug("job execution skipped", { job_id: jobId, reason: claim.reason });
				return { kind: "skipped", job_id: jobId, reason: claim.reason };
			}
			job = claim.job;
		} catch (err) {
			this.#logger.error("job could not be claimed", { job_id: jobId, ...errorFields(err) });
			return { kind: "error", job_id: jobId, reason: errorMessage(err) };
		}

		try {
			this.#logger.info("executing job", {
				job_id: job.job_id,
				job_type: job.job_type,
				target: job.target_handle,
				run_at: job.run_at,
			});
			const result = await this.#performWithTimeout(actionForJob(job));

			// Audited even when the status write fails.
			let recorded: JobRecord = job;
			let statusError: unknown = null;
			try {
				const decision = result.ok
					? await this.#store.markDone(job.job_id)
					: await this.#store.markFailed(job.job_id, result.reason);
				recorded = decision.job ?? job;
			} catch (err) {
				statusError = err;
				this.#logger.error("job outcome could not be recorded", { job_id: job.job_id, ...errorFields(err) });
			}

			await this.#audit.record({
				actor: null,
				action: job.job_type,
				target: job.target_handle,
				details: {
					job_id: job.job_id,
					run_at: job.run_at,
					requested_by: job.created_by,
					source: job.metadata.source ?? null,
					...(result.ok
						? { status: "done", output: result.output }
						: { status: "failed", reason: result.reason }),
					...(statusError === null ? {} : { status_write_failed: errorMessage(statusError) }),
				},
			});

			if (statusError !== null) {
				return { kind: "error", job_id: job.job_id, reason: errorMessage(statusError) };
			}
			if (result.ok) {
				this.#logger.info("job done", { job_id: job.job_id, target: job.target_handle });
				return { kind: "done", job: recorded, output: result.output };
			}
			this.#logger.warn("job failed", { job_id: job.job_id, target: job.target_handle, reason: result.reason });
			return { kind: "failed", job: recorded, reason: result.reason };
		} finally {
			this.#store.release(job.job_id);
		}
	}
}
