import { type Logger, silentLogger } from "@dirops/core";
import { type DurableJobStore, jobRunAtMs } from "./job_store.js";
import type { JobScheduler } from "./scheduler.js";

export const DEFAULT_OVERDUE_DELAY_MS = 5_000;

export type RestoredJob = {
	job_id: number;
	due_at_ms: number;
	overdue: boolean;
};

export type SkippedJob = {
	job_id: number | null;
	reason: string;
};

export type RecoveryReport = {
	restored: RestoredJob[];
	skipped: SkippedJob[];
};

export type RecoveryBootstrapperOpts = {
	store: DurableJobStore;
	scheduler: JobScheduler;
	logger?: Logger;
	nowMs?: () => number;
	overdueDelayMs?: number;
};

/**
 * Re-arms every persisted scheduled job on startup. Overdue jobs run after a
 * short fixed delay; running it again replaces the timers it armed before.
 */
export class RecoveryBootstrapper {
	readonly #store: DurableJobStore;
	readonly #scheduler: JobScheduler;
	readonly #logger: Logger;
	readonly #nowMs: () => number;
	readonly #overdueDelayMs: number;

	public constructor(opts: RecoveryBootstrapperOpts) {
		this.#store = opts.store;
		this.#scheduler = opts.scheduler;
		this.#logger = opts.logger ?? silentLogger();
		this.#nowMs = opts.nowMs ?? Date.now;
		this.#overdueDelayMs = Math.max(0, Math.trunc(opts.overdueDelayMs ?? DEFAULT_OVERDUE_DELAY_MS));
	}

	public async restoreOnStartup(): Promise<RecoveryReport> {
		const report: RecoveryReport = { restored: [], skipped: [] };

		for (const issue of await this.#store.loadIssues()) {
			this.#logger.warn("recovery inconsistency: unreadable job row", {
				line: issue.line,
				job_id: issue.job_id,
				reason: issue.reason,
			});
			report.skipped.push({ job_id: issue.job_id, reason: issue.reason });
		}

		const nowMs = Math.trunc(this.#nowMs());
		for (const job of await this.#store.listScheduled()) {
			const runAtMs = jobRunAtMs(job);
			if (runAtMs == null) {
				const reason = `unparsable run_at: ${JSON.stringify(job.run_at)}`;
				this.#logger.warn("recovery inconsistency: job skipped", { job_id: job.job_id, reason });
				report.skipped.push({ job_id: job.job_id, reason });
				continue;
			}
			const overdue = runAtMs <= nowMs;
			const dueAtMs = overdue ? nowMs + this.#overdueDelayMs : runAtMs;
			this.#scheduler.arm(job, dueAtMs);
			report.restored.push({ job_id: job.job_id, due_at_ms: dueAtMs, overdue });
		}

		this.#logger.info("scheduled jobs restored", {
			restored: report.restored.length,
			overdue: report.restored.filter((job) => job.overdue).length,
			skipped: report.skipped.length,
		});
		return report;
	}
}
