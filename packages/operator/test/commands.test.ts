import { InMemoryJsonlStore, Logger, MemoryLogSink } from "@dirops/core";
import { NoopActionExecutor } from "@dirops/directory";
import { AdminRoster, CONSOLE_HELP, OperatorConsole, parseConsoleCommand } from "@dirops/operator";
import { AuditLog, DurableJobStore, JobExecutor, JobScheduler } from "@dirops/scheduler";
import { describe, expect, test } from "vitest";

const RUN_AT_MS = Date.UTC(2025, 0, 10, 15);

function setup() {
	const sink = new MemoryLogSink();
	const logger = new Logger({ sinks: [sink.write] });
	const store = new DurableJobStore({ store: new InMemoryJsonlStore(), timeZone: "Europe/Berlin", nowMs: () => 0 });
	const audit = new AuditLog({ store: new InMemoryJsonlStore(), nowMs: () => 0 });
	const executor = new JobExecutor({ store, actions: new NoopActionExecutor(), audit });
	const scheduler = new JobScheduler({ store, executor });
	const admins = new AdminRoster({ store: new InMemoryJsonlStore(), superadmin: "100", nowMs: () => 0 });
	const operatorConsole = new OperatorConsole({ admins, store, scheduler, audit, logger });
	const send = async (principal: string, text: string): Promise<string> => {
		const command = parseConsoleCommand(text);
		if (!command) {
			throw new Error(`not a command: ${text}`);
		}
		return (await operatorConsole.handle(principal, command)).text;
	};
	return { sink, store, audit, admins, send };
}

describe("parseConsoleCommand", () => {
	test("parses commands and their arguments", () => {
		expect(parseConsoleCommand("hello")).toBeNull();
		expect(parseConsoleCommand(" /jobs@dirops_bot ")).toEqual({ kind: "jobs" });
		expect(parseConsoleCommand("/cancel_job #12")).toEqual({ kind: "cancel_job", jobId: 12 });
		expect(parseConsoleCommand("/cancel_job 0")).toEqual({ kind: "cancel_job", jobId: null });
		expect(parseConsoleCommand("/cancel_job twelve")).toEqual({ kind: "cancel_job", jobId: null });
		expect(parseConsoleCommand("/admin_add 200")).toEqual({ kind: "admin_add", principal: "200" });
		expect(parseConsoleCommand("/admin_remove")).toEqual({ kind: "admin_remove", principal: null });
		expect(parseConsoleCommand("/Reboot now")).toEqual({ kind: "unknown", name: "reboot" });
	});
});

describe("OperatorConsole", () => {
	test("anyone may ask who they are", async () => {
		const { send } = setup();

		expect(await send("300", "/start")).toBe("Access is restricted to operators. Your id: 300");
		expect(await send("100", "/start")).toBe("Ready. Send a request or /help.");
		expect(await send("300", "/whoami")).toBe("id: 300\nrole: user");
		expect(await send("100", "/whoami")).toBe("id: 100\nrole: superadmin");
		expect(await send("300", "/nope")).toBe("Unknown command: /nope. Try /help.");
	});

	test("other commands need an operator", async () => {
		const { sink, send } = setup();

		expect(await send("300", "/jobs")).toBe("Access denied. Your id: 300");
		expect(sink.find("console command refused")[0]?.fields).toEqual({ principal: "300", command: "jobs" });
		expect(await send("100", "/help")).toBe(CONSOLE_HELP);
	});

	test("lists scheduled jobs", async () => {
		const { store, send } = setup();
		expect(await send("100", "/jobs")).toBe("No scheduled jobs.");

		await store.createJob({ targetHandle: "alice", runAtMs: RUN_AT_MS, createdBy: "100" });
		await store.createJob({ targetHandle: "bob", runAtMs: RUN_AT_MS + 60_000, createdBy: "system" });
		await store.markDone(2);

		expect(await send("100", "/jobs")).toBe("Scheduled jobs:\n#1 alice at 2025-01-10T16:00:00+01:00 (by 100)");
	});

	test("cancels scheduled jobs", async () => {
		const { store, audit, send } = setup();
		await store.createJob({ targetHandle: "alice", runAtMs: RUN_AT_MS, createdBy: "100" });
		await store.createJob({ targetHandle: "bob", runAtMs: RUN_AT_MS, createdBy: "100" });

		expect(await send("100", "/cancel_job")).toBe("Usage: /cancel_job <id>");
		expect(await send("100", "/cancel_job 99")).toBe("Job #99 not found.");
		expect(await send("100", "/cancel_job #1")).toBe("Job #1 cancelled.");
		expect(await send("100", "/cancel_job 1")).toBe("Job #1 is already failed.");

		await store.claim(2);
		expect(await send("100", "/cancel_job 2")).toBe("Job #2 is running and cannot be cancelled.");

		expect(await audit.list({ action: "cancel_job" })).toEqual([
			{
				kind: "audit",
				ts_ms: 0,
				ts: "1970-01-01T00:00:00+00:00",
				actor: "100",
				action: "cancel_job",
				target: "alice",
				details: { job_id: 1, run_at: "2025-01-10T16:00:00+01:00" },
			},
		]);
	});

	test("manages the admin roster", async () => {
		const { audit, send } = setup();

		expect(await send("100", "/admins")).toBe("Superadmin: 100\nNo admins.");
		expect(await send("100", "/admin_add")).toBe("Usage: /admin_add <id>");
		expect(await send("100", "/admin_add 200")).toBe("200 added as admin.");
		expect(await send("100", "/admin_add 200")).toBe("200 is already an admin.");
		expect(await send("200", "/admin_add 300")).toBe("Only the superadmin can add admins.");
		expect(await send("200", "/admins")).toBe("Superadmin: 100\nAdmins:\n- 200 (added by 100)");

		expect(await send("100", "/admin_remove")).toBe("Usage: /admin_remove <id>");
		expect(await send("200", "/admin_remove 200")).toBe("Only the superadmin can remove admins.");
		expect(await send("100", "/admin_remove 100")).toBe("The superadmin cannot be removed.");
		expect(await send("100", "/admin_remove 400")).toBe("400 is not an admin.");
		expect(await send("100", "/admin_remove 200")).toBe("200 removed.");
		expect(await send("200", "/jobs")).toBe("Access denied. Your id: 200");

		expect((await audit.list()).map((entry) => `${entry.action}:${entry.target}`)).toEqual([
			"add_admin:200",
			"remove_admin:200",
		]);
	});
});
