import { z } from "zod";

export const JobStatusSchema = z.enum(["scheduled", "done", "failed"]);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const JobTypeSchema = z.enum(["disable_account"]);
export type JobType = z.infer<typeof JobTypeSchema>;

export const TERMINAL_JOB_STATUSES = ["done", "failed"] as const;
export type TerminalJobStatus = (typeof TERMINAL_JOB_STATUSES)[number];

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
	scheduled: ["done", "failed"],
	done: [],
	failed: [],
};

const TERMINAL_SET = new Set<JobStatus>(TERMINAL_JOB_STATUSES);

export function isTerminalJobStatus(status: JobStatus): status is TerminalJobStatus {
	return TERMINAL_SET.has(status);
}

export function canTransitionJob(from: JobStatus, to: JobStatus): boolean {
	if (from === to) {
		return false;
	}
	return ALLOWED_TRANSITIONS[from].includes(to);
}

export class InvalidJobTransitionError extends Error {
	public readonly from: JobStatus;
	public readonly to: JobStatus;

	public constructor(from: JobStatus, to: JobStatus) {
		super(`invalid job transition: ${from} -> ${to}`);
		this.name = "InvalidJobTransitionError";
		this.from = from;
		this.to = to;
	}
}

export function assertValidJobTransition(from: JobStatus, to: JobStatus): void {
	if (!canTransitionJob(from, to)) {
		throw new InvalidJobTransitionError(from, to);
	}
}
