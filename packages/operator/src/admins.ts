import { errorFields, type JsonlStore, type Logger, SerializedMutationExecutor, silentLogger } from "@dirops/core";
import { isJsonlUnparsedLine } from "@dirops/core/node";
import { z } from "zod";

export const AdminAddEntrySchema = z.object({
	kind: z.literal("admin.add"),
	ts_ms: z.number().int(),
	principal: z.string().min(1),
	actor: z.string().min(1),
});

export const AdminRemoveEntrySchema = z.object({
	kind: z.literal("admin.remove"),
	ts_ms: z.number().int(),
	principal: z.string().min(1),
	actor: z.string().min(1),
});

export const AdminRosterEntrySchema = z.discriminatedUnion("kind", [AdminAddEntrySchema, AdminRemoveEntrySchema]);
export type AdminRosterEntry = z.infer<typeof AdminRosterEntrySchema>;

export type OperatorRole = "superadmin" | "admin" | "user";

export type AdminBinding = {
	principal: string;
	added_by: string;
	added_at_ms: number;
};

export type AddAdminDecision =
	| { kind: "added"; admin: AdminBinding }
	| { kind: "already_admin"; admin: AdminBinding | null }
	| { kind: "forbidden" };

export type RemoveAdminDecision =
	| { kind: "removed"; principal: string }
	| { kind: "not_found" }
	| { kind: "protected" }
	| { kind: "forbidden" };

export type AdminRosterOpts = {
	store: JsonlStore<unknown>;
	superadmin: string | null;
	logger?: Logger;
	nowMs?: () => number;
};

/** A roster row skipped on load. */
export type AdminRosterIssue = {
	line: number;
	reason: string;
};

function normalizePrincipal(value: string): string | null {
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

/** Operators allowed to issue requests. The superadmin comes from configuration. */
export class AdminRoster {
	readonly #store: JsonlStore<unknown>;
	readonly #superadmin: string | null;
	readonly #logger: Logger;
	readonly #nowMs: () => number;
	readonly #admins = new Map<string, AdminBinding>();
	readonly #mutations = new SerializedMutationExecutor();
	#issues: AdminRosterIssue[] = [];
	#loaded: Promise<void> | null = null;

	public constructor(opts: AdminRosterOpts) {
		this.#store = opts.store;
		this.#superadmin = opts.superadmin ? normalizePrincipal(opts.superadmin) : null;
		this.#logger = opts.logger ?? silentLogger();
		this.#nowMs = opts.nowMs ?? Date.now;
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
			this.#logger.error("admin roster could not be read", errorFields(err));
			throw err;
		}
		const issues: AdminRosterIssue[] = [];
		this.#admins.clear();
		rows.forEach((row, index) => {
			if (isJsonlUnparsedLine(row)) {
				issues.push({ line: row.line_number, reason: `unreadable row: ${row.error}` });
				return;
			}
			const parsed = AdminRosterEntrySchema.safeParse(row);
			if (!parsed.success) {
				issues.push({ line: index + 1, reason: "invalid admin roster row" });
				return;
			}
			this.#apply(parsed.data);
		});
		for (const issue of issues) {
			this.#logger.warn("admin roster row skipped", { ...issue });
		}
		this.#issues = issues;
	}

	#apply(entry: AdminRosterEntry): void {
		switch (entry.kind) {
			case "admin.add":
				this.#admins.set(entry.principal, {
					principal: entry.principal,
					added_by: entry.actor,
					added_at_ms: entry.ts_ms,
				});
				break;
			case "admin.remove":
				this.#admins.delete(entry.principal);
				break;
		}
	}

	/** Rows skipped on load; their grants and revocations are ignored. */
	public async loadIssues(): Promise<AdminRosterIssue[]> {
		await this.#ensureLoaded();
		return this.#issues.map((issue) => ({ ...issue }));
	}

	public get superadmin(): string | null {
		return this.#superadmin;
	}

	public isSuperadmin(principal: string): boolean {
		return this.#superadmin != null && principal.trim() === this.#superadmin;
	}

	public async isAdmin(principal: string): Promise<boolean> {
		return (await this.role(principal)) !== "user";
	}

	public async role(principal: string): Promise<OperatorRole> {
		if (this.isSuperadmin(principal)) {
			return "superadmin";
		}
		await this.#ensureLoaded();
		return this.#admins.has(principal.trim()) ? "admin" : "user";
	}

	public async list(): Promise<AdminBinding[]> {
		await this.#ensureLoaded();
		return [...this.#admins.values()]
			.map((admin) => ({ ...admin }))
			.sort((a, b) => a.added_at_ms - b.added_at_ms || a.principal.localeCompare(b.principal));
	}

	public async add(principalRaw: string, actor: string): Promise<AddAdminDecision> {
		return await this.#mutations.run(async (): Promise<AddAdminDecision> => {
			if (!this.isSuperadmin(actor)) {
				return { kind: "forbidden" };
			}
			await this.#ensureLoaded();
			const principal = normalizePrincipal(principalRaw);
			if (!principal) {
				throw new Error("admin_principal_required");
			}
			if (this.isSuperadmin(principal)) {
				return { kind: "already_admin", admin: null };
			}
			const existing = this.#admins.get(principal);
			if (existing) {
				return { kind: "already_admin", admin: { ...existing } };
			}
			const entry = AdminAddEntrySchema.parse({
				kind: "admin.add",
				ts_ms: Math.trunc(this.#nowMs()),
				principal,
				actor: actor.trim(),
			});
			await this.#store.append(entry);
			this.#apply(entry);
			return { kind: "added", admin: { principal, added_by: entry.actor, added_at_ms: entry.ts_ms } };
		});
	}

	public async remove(principalRaw: string, actor: string): Promise<RemoveAdminDecision> {
		return await this.#mutations.run(async (): Promise<RemoveAdminDecision> => {
			if (!this.isSuperadmin(actor)) {
				return { kind: "forbidden" };
			}
			await this.#ensureLoaded();
			const principal = normalizePrincipal(principalRaw);
			if (!principal) {
				throw new Error("admin_principal_required");
			}
			if (this.isSuperadmin(principal)) {
				return { kind: "protected" };
			}
			if (!this.#admins.has(principal)) {
				return { kind: "not_found" };
			}
			const entry = AdminRemoveEntrySchema.parse({
				kind: "admin.remove",
				ts_ms: Math.trunc(this.#nowMs()),
				principal,
				actor: actor.trim(),
			});
			await this.#store.append(entry);
			this.#apply(entry);
			return { kind: "removed", principal };
		});
	}
}
