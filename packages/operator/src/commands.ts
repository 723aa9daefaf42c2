import { type Logger, silentLogger } from "@dirops/core";
import type { AuditLog, DurableJobStore, JobRecord, JobScheduler } from "@dirops/scheduler";
import type { AdminRoster } from "./admins.js";
import { type Reply, textReply } from "./reply.js";

export type ConsoleCommand =
	| { kind: "start" }
	| { kind: "help" }
	| { kind: "whoami" }
	| { kind: "jobs" }
	| { kind: "cancel_job"; jobId: number | null }
	| { kind: "admins" }
	| { kind: "admin_add"; principal: string | null }
	| { kind: "admin_remove"; principal: string | null }
	| { kind: "unknown"; name: string };

function splitTokens(body: string): string[] {
	return body
		.split(/\s+/)
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
}

function parseJobId(raw: string | undefined): number | null {
	if (!raw || !/^#?\d+$/.test(raw)) {
		return null;
	}
	const value = Number.parseInt(raw.replace(/^#/, ""), 10);
	return Number.isSafeInteger(value) && value > 0 ? value : null;
}

/** Null when `raw` is not a slash command. A `@botname` suffix on the command is ignored. */
export function parseConsoleCommand(raw: string): ConsoleCommand | null {
	const trimmed = raw.trim();
	if (!trimmed.startsWith("/")) {
		return null;
	}
	const [head = "", ...args] = splitTokens(trimmed.slice(1));
	const name = (head.split("@")[0] ?? "").toLowerCase();
	switch (name) {
		case "start":
			return { kind: "start" };
		case "help":
			return { kind: "help" };
		case "whoami":
			return { kind: "whoami" };
		case "jobs":
			return { kind: "jobs" };
		case "cancel_job":
			return { kind: "cancel_job", jobId: parseJobId(args[0]) };
		case "admins":
			return { kind: "admins" };
		case "admin_add":
			return { kind: "admin_add", principal: args[0] ?? null };
		case "admin_remove":
			return { kind: "admin_remove", principal: args[0] ?? null };
		default:
			return { kind: "unknown", name };
	}
}

export const CONSOLE_HELP = [
	"Requests:",
	"  reset password <name or login>",
	"  disable account <name or login> [date]",
	"Commands:",
	"  /jobs - scheduled deactivations",
	"  /cancel_job <id> - cancel a scheduled deactivation",
	"  /admins - list operators",
	"  /admin_add <id> - grant access (superadmin)",
	"  /admin_remove <id> - revoke access (superadmin)",
	"  /whoami - your id and role",
].join("\n");

export function formatJobLine(job: JobRecord): string {
	return `#${job.job_id} ${job.target_handle} at ${job.run_at} (by ${job.created_by})`;
}

export type OperatorConsoleOpts = {
	admins: AdminRoster;
	store: DurableJobStore;
	scheduler: JobScheduler;
	audit: AuditLog;
	logger?: Logger;
};

/** Slash commands for operators. Authorization is decided per command. */
export class OperatorConsole {
	readonly #admins: AdminRoster;
	readonly #store: DurableJobStore;
	readonly #scheduler: JobScheduler;
	readonly #audit: AuditLog;
	readonly #logger: Logger;

	public constructor(opts: OperatorConsoleOpts) {
		this.#admins = opts.admins;
		this.#store = opts.store;
		this.#scheduler = opts.scheduler;
		this.#audit = opts.audit;
		this.#logger = opts.logger ?? silentLogger();
	}

	public async handle(principal: string, command: ConsoleCommand): Promise<Reply> {
		const role = await this.#admins.role(principal);
		switch (command.kind) {
			case "start":
				return textReply(
					role === "user"
						? `Access is restricted to operators. Your id: ${principal}`
						: `Ready. Send a request or /help.`,
				);
			case "whoami":
				return textReply(`id: ${principal}\nrole: ${role}`);
			case "unknown":
				return textReply(`Unknown command: /${command.name}. Try /help.`);
			default:
				break;
		}

		if (role === "user") {
			this.#logger.warn("console command refused", { principal, command: command.kind });
			return textReply(`Access denied. Your id: ${principal}`);
		}

		switch (command.kind) {
			case "help":
				return textReply(CONSOLE_HELP);
			case "jobs":
				return await this.#listJobs();
			case "cancel_job":
				return await this.#cancelJob(principal, command.jobId);
			case "admins":
				return await this.#listAdmins();
			case "admin_add":
				return await this.#addAdmin(principal, command.principal);
			case "admin_remove":
				return await this.#removeAdmin(principal, command.principal);
		}
	}

	async #listJobs(): Promise<Reply> {
		const jobs = await this.#store.listScheduled();
		if (jobs.length === 0) {
			return textReply("No scheduled jobs.");
		}
		return textReply(["Scheduled jobs:", ...jobs.map(formatJobLine)].join("\n"));
	}

	async #cancelJob(actor: string, jobId: number | null): Promise<Reply> {
		if (jobId == null) {
			return textReply("Usage: /cancel_job <id>");
		}
		const decision = await this.#scheduler.cancel(jobId, actor);
		if (decision.kind === "noop") {
			if (decision.reason === "not_found") {
				return textReply(`Job #${jobId} not found.`);
			}
			if (decision.reason === "in_flight") {
				return textReply(`Job #${jobId} is running and cannot be cancelled.`);
			}
			return textReply(`Job #${jobId} is already ${decision.job?.status ?? "finished"}.`);
		}
		await this.#audit.record({
			actor,
			action: "cancel_job",
			target: decision.job.target_handle,
			details: { job_id: jobId, run_at: decision.job.run_at },
		});
		return textReply(`Job #${jobId} cancelled.`);
	}

	async #listAdmins(): Promise<Reply> {
		const admins = await this.#admins.list();
		const lines = [`Superadmin: ${this.#admins.superadmin ?? "(not configured)"}`];
		if (admins.length === 0) {
			lines.push("No admins.");
		} else {
			lines.push("Admins:", ...admins.map((admin) => `- ${admin.principal} (added by ${admin.added_by})`));
		}
		return textReply(lines.join("\n"));
	}

	async #addAdmin(actor: string, principal: string | null): Promise<Reply> {
		if (!principal) {
			return textReply("Usage: /admin_add <id>");
		}
		const decision = await this.#admins.add(principal, actor);
		switch (decision.kind) {
			case "forbidden":
				return textReply("Only the superadmin can add admins.");
			case "already_admin":
				return textReply(`${principal} is already an admin.`);
			case "added":
				await this.#audit.record({ actor, action: "add_admin", target: decision.admin.principal, details: null });
				return textReply(`${decision.admin.principal} added as admin.`);
		}
	}

	async #removeAdmin(actor: string, principal: string | null): Promise<Reply> {
		if (!principal) {
			return textReply("Usage: /admin_remove <id>");
		}
		const decision = await this.#admins.remove(principal, actor);
		switch (decision.kind) {
			case "forbidden":
				return textReply("Only the superadmin can remove admins.");
			case "protected":
				return textReply("The superadmin cannot be removed.");
			case "not_found":
				return textReply(`${principal} is not an admin.`);
			case "removed":
				await this.#audit.record({ actor, action: "remove_admin", target: decision.principal, details: null });
				return textReply(`${decision.principal} removed.`);
		}
	}
}
