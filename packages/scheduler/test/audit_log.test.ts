import { InMemoryJsonlStore, type JsonlStore, Logger, MemoryLogSink } from "@dirops/core";
import { FsJsonlStore, readJsonl } from "@dirops/core/node";
import { AuditLog } from "@dirops/scheduler";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

const BROKEN_STORE: JsonlStore<unknown> = {
	read: async () => [],
	write: async () => {
		throw new Error("read-only file system");
	},
	append: async () => {
		throw new Error("read-only file system");
	},
};

describe("AuditLog", () => {
	test("records entries with a zoned timestamp", async () => {
		const audit = new AuditLog({
			store: new InMemoryJsonlStore(),
			timeZone: "Europe/Berlin",
			nowMs: () => Date.UTC(2025, 0, 10, 15),
		});

		const entry = await audit.record({
			actor: "op-1",
			action: "schedule_disable",
			target: "alice",
			details: { job_id: 1 },
		});

		expect(entry).toEqual({
			kind: "audit",
			ts_ms: Date.UTC(2025, 0, 10, 15),
			ts: "2025-01-10T16:00:00+01:00",
			actor: "op-1",
			action: "schedule_disable",
			target: "alice",
			details: { job_id: 1 },
		});
	});

	test("filters by action, target and actor", async () => {
		const audit = new AuditLog({ store: new InMemoryJsonlStore(), nowMs: () => 0 });
		await audit.record({ actor: "op-1", action: "reset_password", target: "alice" });
		await audit.record({ actor: null, action: "disable_account", target: "alice" });
		await audit.record({ actor: "op-2", action: "reset_password", target: "bob" });

		expect((await audit.list()).map((entry) => entry.target)).toEqual(["alice", "alice", "bob"]);
		expect((await audit.list({ action: "reset_password" })).map((entry) => entry.actor)).toEqual(["op-1", "op-2"]);
		expect((await audit.list({ target: "alice", actor: "op-1" })).map((entry) => entry.action)).toEqual([
			"reset_password",
		]);
	});

	test("a failed write is logged and never thrown", async () => {
		const sink = new MemoryLogSink();
		const audit = new AuditLog({ store: BROKEN_STORE, logger: new Logger({ sinks: [sink.write] }) });

		await expect(audit.record({ actor: "op-1", action: "add_admin", target: "op-2" })).resolves.toBeNull();
		expect(sink.records).toHaveLength(1);
		expect(sink.records[0]).toMatchObject({
			level: "error",
			message: "audit entry could not be recorded",
			fields: { action: "add_admin", actor: "op-1", target: "op-2", error: "read-only file system" },
		});
	});

	test("unreadable rows are skipped when listing", async () => {
		const sink = new MemoryLogSink();
		const audit = new AuditLog({
			store: new InMemoryJsonlStore<unknown>([{ kind: "audit" }]),
			logger: new Logger({ sinks: [sink.write] }),
			nowMs: () => 0,
		});
		await audit.record({ actor: "op-1", action: "cancel_job", target: "alice" });

		expect((await audit.list()).map((entry) => entry.action)).toEqual(["cancel_job"]);
		expect(sink.find("skipping unreadable audit row")[0]?.fields).toEqual({ line: 1 });
	});

	test("entries are appended to a JSONL file", async () => {
		const dir = await mkdtemp(join(tmpdir(), "dirops-audit-"));
		const path = join(dir, "audit.jsonl");
		const audit = new AuditLog({ store: new FsJsonlStore(path, { lenient: true }), nowMs: () => 0 });

		await audit.record({ actor: "op-1", action: "remove_admin", target: "op-2" });
		await audit.record({ actor: "op-1", action: "add_admin", target: "op-3" });

		const rows = await readJsonl(path);
		expect(rows).toHaveLength(2);
		expect(rows[1]).toMatchObject({ action: "add_admin", target: "op-3", details: null });
	});
});
