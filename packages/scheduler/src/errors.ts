import { errorMessage } from "@dirops/core";

/** A durable write did not complete; the in-memory state was left unchanged. */
export class PersistenceFailureError extends Error {
	public readonly operation: string;

	public constructor(operation: string, cause: unknown) {
		super(`${operation} could not be persisted: ${errorMessage(cause)}`, { cause });
		this.name = "PersistenceFailureError";
		this.operation = operation;
	}
}

export class SchedulerNotReadyError extends Error {
	public constructor() {
		super("scheduler is not accepting submissions until recovery has completed");
		this.name = "SchedulerNotReadyError";
	}
}
