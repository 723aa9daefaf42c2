import {
	errorFields,
	formatZonedIso,
	type JsonlStore,
	type Logger,
	SerializedMutationExecutor,
	silentLogger,
} from "@dirops/core";
import { z } from "zod";

export const AuditEntrySchema = z.object({
	kind: z.literal("audit"),
	ts_ms: z.number().int(),
	ts: z.string().min(1),
	/** Null for system-originated actions. */
	actor: z.string().nullable(),
	action: z.string().min(1),
	target: z.string().nullable(),
	details: z.record(z.string(), z.unknown()).nullable(),
});
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export type AuditRecordOpts = {
	actor: string | null;
	action: string;
	target?: string | null;
	details?: Record<string, unknown> | null;
};

export type AuditListOpts = {
	action?: string | null;
	target?: string | null;
	actor?: string | null;
};

export type AuditLogOpts = {
	store: JsonlStore<unknown>;
	logger?: Logger;
	timeZone?: string;
	nowMs?: () => number;
};

/** Append-only record of administrative actions. Recording never throws. */
export class AuditLog {
	readonly #store: JsonlStore<unknown>;
	readonly #logger: Logger;
	readonly #timeZone: string;
	readonly #nowMs: () => number;
	readonly #writes = new SerializedMutationExecutor();

	public constructor(opts: AuditLogOpts) {
		this.#store = opts.store;
		this.#logger = opts.logger ?? silentLogger();
		this.#timeZone = opts.timeZone ?? "UTC";
		this.#nowMs = opts.nowMs ?? Date.now;
	}

	/** Appends one entry; on failure logs the error and resolves to null. */
	public async record(opts: AuditRecordOpts): Promise<AuditEntry | null> {
		const tsMs = Math.trunc(this.#nowMs());
		try {
			const entry = AuditEntrySchema.parse({
				kind: "audit",
				ts_ms: tsMs,
				ts: formatZonedIso(tsMs, this.#timeZone),
				actor: opts.actor,
				action: opts.action,
				target: opts.target ?? null,
				details: opts.details ? { ...opts.details } : null,
			});
			await this.#writes.run(async () => await this.#store.append(entry));
			return entry;
		} catch (err) {
			this.#logger.error("audit entry could not be recorded", {
				action: opts.action,
				actor: opts.actor,
				target: opts.target ?? null,
				...errorFields(err),
			});
			return null;
		}
	}

	public async list(opts: AuditListOpts = {}): Promise<AuditEntry[]> {
		await this.#writes.drain();
		const rows = await this.#store.read();
		const out: AuditEntry[] = [];
		rows.forEach((row, index) => {
			const parsed = AuditEntrySchema.safeParse(row);
			if (!parsed.success) {
				this.#logger.warn("skipping unreadable audit row", { line: index + 1 });
				return;
			}
			if (opts.action && parsed.data.action !== opts.action) {
				return;
			}
			if (opts.target && parsed.data.target !== opts.target) {
				return;
			}
			if (opts.actor && parsed.data.actor !== opts.actor) {
				return;
			}
			out.push(parsed.data);
		});
		return out;
	}
}
