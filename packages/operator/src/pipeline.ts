import {
	atZonedTime,
	type CalendarDate,
	errorFields,
	errorMessage,
	type Logger,
	silentLogger,
	zonedCalendarDate,
} from "@dirops/core";
import {
	type ActionExecutor,
	type ActionResult,
	generatePassword,
	type Identity,
	type IdentityResolver,
	identityLabel,
	isValidHandle,
} from "@dirops/directory";
import {
	type AuditLog,
	type JobRecord,
	type JobScheduler,
	PersistenceFailureError,
	SchedulerNotReadyError,
	SYSTEM_PRINCIPAL,
} from "@dirops/scheduler";
import type { AdminRoster } from "./admins.js";
import { encodeCallbackPayload, parseCallbackPayload } from "./callback_payload.js";
import { type OperatorConsole, parseConsoleCommand } from "./commands.js";
import { type IntentClassifier, RuleIntentClassifier } from "./intent.js";
import type { MailOffboardingEvent } from "./mail.js";
import { type Reply, textReply } from "./reply.js";
import type { DisambiguationSessions, PendingAction } from "./sessions.js";

export type MailDecision =
	| { kind: "scheduled"; job: JobRecord; replaced: boolean }
	| { kind: "needs_selection"; token: string; reply: Reply }
	| { kind: "ambiguous"; query: string; candidates: Identity[] }
	| { kind: "not_found"; query: string }
	| { kind: "rejected"; reason: string };

export type RequestPipelineOpts = {
	admins: AdminRoster;
	console: OperatorConsole;
	resolver: IdentityResolver;
	sessions: DisambiguationSessions;
	scheduler: JobScheduler;
	actions: ActionExecutor;
	audit: AuditLog;
	timeZone: string;
	classifier?: IntentClassifier;
	defaultHour?: number;
	defaultMinute?: number;
	candidateLimit?: number;
	passwordFactory?: () => string;
	logger?: Logger;
	nowMs?: () => number;
};

type ScheduleOutcome =
	| { kind: "scheduled"; job: JobRecord; replaced: boolean }
	| { kind: "rejected"; reason: string; reply: string };

export const NOT_UNDERSTOOD_REPLY =
	'Request not understood. Examples: "reset password Ivanov", "disable account Ivanov 10.01.2025". See /help.';
export const SELECTION_EXPIRED_REPLY = "Selection expired, please retry.";

function notFoundReply(query: string): string {
	return `Not found: "${query}".`;
}

/**
 * Turns operator text, button selections and offboarding mails into directory
 * actions. Deactivations go through the scheduler; password resets run at once.
 */
export class RequestPipeline {
	readonly #admins: AdminRoster;
	readonly #console: OperatorConsole;
	readonly #resolver: IdentityResolver;
	readonly #sessions: DisambiguationSessions;
	readonly #scheduler: JobScheduler;
	readonly #actions: ActionExecutor;
	readonly #audit: AuditLog;
	readonly #timeZone: string;
	readonly #classifier: IntentClassifier;
	readonly #defaultHour: number;
	readonly #defaultMinute: number;
	readonly #candidateLimit: number | undefined;
	readonly #passwordFactory: () => string;
	readonly #logger: Logger;
	readonly #nowMs: () => number;

	public constructor(opts: RequestPipelineOpts) {
		this.#admins = opts.admins;
		this.#console = opts.console;
		this.#resolver = opts.resolver;
		this.#sessions = opts.sessions;
		this.#scheduler = opts.scheduler;
		this.#actions = opts.actions;
		this.#audit = opts.audit;
		this.#timeZone = opts.timeZone;
		this.#classifier = opts.classifier ?? new RuleIntentClassifier();
		this.#defaultHour = Math.min(23, Math.max(0, Math.trunc(opts.defaultHour ?? 16)));
		this.#defaultMinute = Math.min(59, Math.max(0, Math.trunc(opts.defaultMinute ?? 0)));
		this.#candidateLimit = opts.candidateLimit;
		this.#passwordFactory = opts.passwordFactory ?? (() => generatePassword());
		this.#logger = opts.logger ?? silentLogger();
		this.#nowMs = opts.nowMs ?? Date.now;
	}

	#today(): CalendarDate {
		return zonedCalendarDate(this.#nowMs(), this.#timeZone);
	}

	/** Run time for a deactivation on `date` (default today) at the configured hour. */
	public runAtFor(date: CalendarDate | null): number {
		return atZonedTime(
			date ?? this.#today(),
			{ hour: this.#defaultHour, minute: this.#defaultMinute },
			this.#timeZone,
		);
	}

	public async handleText(principal: string, text: string): Promise<Reply> {
		const command = parseConsoleCommand(text);
		if (command) {
			return await this.#console.handle(principal, command);
		}
		if (!(await this.#admins.isAdmin(principal))) {
			this.#logger.warn("request from non-admin refused", { principal });
			return textReply(`Access denied. Your id: ${principal}`);
		}

		const classified = this.#classifier.classify(text, { today: this.#today() });
		if (!classified.intent) {
			return textReply(NOT_UNDERSTOOD_REPLY);
		}
		if (!classified.query) {
			return textReply("Whom? Add a name or login to the request.");
		}

		const pending: PendingAction = {
			kind: classified.intent,
			target_query: classified.query,
			requested_by: principal,
			scheduled_for_ms: classified.intent === "disable_account" ? this.runAtFor(classified.date) : null,
			source: "chat",
		};
		this.#logger.info("request classified", {
			principal,
			intent: pending.kind,
			query: pending.target_query,
			scheduled_for_ms: pending.scheduled_for_ms,
		});

		const candidates = await this.#resolver.resolve(pending.target_query, this.#candidateLimit);
		const [only] = candidates;
		if (!only) {
			return textReply(notFoundReply(pending.target_query));
		}
		if (candidates.length === 1) {
			return await this.#perform(principal, pending, only);
		}
		return this.#selectionReply(
			pending,
			candidates,
			`Several matches for "${pending.target_query}". Choose one:`,
		).reply;
	}

	public async handleSelection(principal: string, rawPayload: unknown): Promise<Reply> {
		const payload = parseCallbackPayload(rawPayload);
		if (!payload) {
			this.#logger.warn("unrecognized selection payload", { principal });
			return textReply("Unrecognized selection.");
		}
		if (!(await this.#admins.isAdmin(principal))) {
			this.#logger.warn("selection from non-admin refused", { principal });
			return textReply(`Access denied. Your id: ${principal}`);
		}
		if (payload.kind === "cancel") {
			this.#sessions.cancel(payload.token);
			return textReply("Cancelled.");
		}

		const decision = this.#sessions.resolve(payload.token, payload.handle);
		if (decision.kind === "not_found") {
			this.#logger.info("selection not resolved", { principal, reason: decision.reason });
			return textReply(SELECTION_EXPIRED_REPLY);
		}
		return await this.#perform(principal, decision.pending, decision.identity);
	}

	/**
	 * Schedules the deactivation an offboarding mail announces. An explicit
	 * handle is used as given; a name with several matches opens a selection
	 * for operators, or with `openSelection: false` is returned as `ambiguous`.
	 */
	public async handleMailOffboarding(
		event: MailOffboardingEvent,
		opts: { openSelection?: boolean } = {},
	): Promise<MailDecision> {
		const pending: PendingAction = {
			kind: "disable_account",
			target_query: event.handle ?? event.name ?? "",
			requested_by: SYSTEM_PRINCIPAL,
			scheduled_for_ms: this.runAtFor(event.targetDate),
			source: "mail",
		};
		this.#logger.info("offboarding mail received", {
			subject: event.subject,
			name: event.name,
			handle: event.handle,
		});

		if (event.handle) {
			if (!isValidHandle(event.handle)) {
				return { kind: "rejected", reason: `invalid handle: ${event.handle}` };
			}
			return await this.#scheduleFromMail(pending, event.handle, null);
		}

		const query = pending.target_query.trim();
		if (!query) {
			return { kind: "rejected", reason: "mail names nobody" };
		}
		const candidates = await this.#resolver.resolve(query, this.#candidateLimit);
		const [only] = candidates;
		if (!only) {
			this.#logger.warn("offboarding target not found", { query });
			return { kind: "not_found", query };
		}
		if (candidates.length === 1) {
			return await this.#scheduleFromMail(pending, only.handle, only);
		}
		if (opts.openSelection === false) {
			return { kind: "ambiguous", query, candidates };
		}
		const subject = event.subject ? `"${event.subject}"` : "(no subject)";
		const selection = this.#selectionReply(
			pending,
			candidates,
			`Offboarding mail ${subject}: several matches for "${query}". Choose one:`,
		);
		return { kind: "needs_selection", token: selection.token, reply: selection.reply };
	}

	#selectionReply(
		pending: PendingAction,
		candidates: readonly Identity[],
		text: string,
	): { token: string; reply: Reply } {
		const token = this.#sessions.open(pending, candidates);
		const choices = candidates.map((identity) => ({
			label: identityLabel(identity),
			payload: encodeCallbackPayload({ kind: "pick", token, handle: identity.handle }),
		}));
		choices.push({ label: "Cancel", payload: encodeCallbackPayload({ kind: "cancel", token }) });
		return { token, reply: { text, choices } };
	}

	async #scheduleFromMail(pending: PendingAction, handle: string, identity: Identity | null): Promise<MailDecision> {
		const outcome = await this.#schedule(null, pending, handle, identity);
		if (outcome.kind === "rejected") {
			return { kind: "rejected", reason: outcome.reason };
		}
		return { kind: "scheduled", job: outcome.job, replaced: outcome.replaced };
	}

	async #perform(actor: string, pending: PendingAction, identity: Identity): Promise<Reply> {
		const label = identityLabel(identity);
		switch (pending.kind) {
			case "reset_password":
				return await this.#resetPassword(actor, identity, label);
			case "disable_account": {
				const outcome = await this.#schedule(actor, pending, identity.handle, identity);
				if (outcome.kind === "rejected") {
					return textReply(outcome.reply);
				}
				const verb = outcome.replaced ? "is already scheduled; request updated" : "scheduled";
				return textReply(
					`Deactivation of ${label} ${verb}: ${outcome.job.run_at} (job #${outcome.job.job_id}).`,
				);
			}
		}
	}

	async #resetPassword(actor: string, identity: Identity, label: string): Promise<Reply> {
		const password = this.#passwordFactory();
		let result: ActionResult;
		try {
			result = await this.#actions.performAction({
				kind: "reset_password",
				handle: identity.handle,
				password,
				mustChangeAtLogon: true,
			});
		} catch (err) {
			result = { ok: false, reason: errorMessage(err) };
		}
		await this.#audit.record({
			actor,
			action: "reset_password",
			target: identity.handle,
			details: result.ok ? { status: "done" } : { status: "failed", reason: result.reason },
		});
		if (!result.ok) {
			this.#logger.warn("password reset failed", { handle: identity.handle, reason: result.reason });
			return textReply(`Password reset for ${label} failed: ${result.reason}`);
		}
		this.#logger.info("password reset", { handle: identity.handle, actor });
		return textReply(`Password for ${label} reset.\nNew password: ${password}\nIt must be changed at next logon.`);
	}

	/** `actor` is null for mail-originated requests. */
	async #schedule(
		actor: string | null,
		pending: PendingAction,
		handle: string,
		identity: Identity | null,
	): Promise<ScheduleOutcome> {
		const runAtMs = pending.scheduled_for_ms ?? this.runAtFor(null);
		const metadata: Record<string, string> = { source: pending.source };
		if (pending.requested_by !== (actor ?? SYSTEM_PRINCIPAL)) {
			metadata.requested_by = pending.requested_by;
		}
		if (identity?.display_name) {
			metadata.display_name = identity.display_name;
		}

		try {
			const decision = await this.#scheduler.schedule({
				targetHandle: handle,
				runAtMs,
				createdBy: actor ?? SYSTEM_PRINCIPAL,
				metadata,
			});
			await this.#audit.record({
				actor,
				action: "schedule_disable",
				target: decision.job.target_handle,
				details: {
					job_id: decision.job.job_id,
					run_at: decision.job.run_at,
					source: pending.source,
					replaced: decision.kind === "replaced",
				},
			});
			return { kind: "scheduled", job: decision.job, replaced: decision.kind === "replaced" };
		} catch (err) {
			if (err instanceof PersistenceFailureError) {
				this.#logger.error("deactivation not scheduled", { handle, ...errorFields(err) });
				return { kind: "rejected", reason: err.message, reply: "Not scheduled: the job could not be saved." };
			}
			if (err instanceof SchedulerNotReadyError) {
				return { kind: "rejected", reason: err.message, reply: "Scheduler is starting, try again shortly." };
			}
			throw err;
		}
	}
}
