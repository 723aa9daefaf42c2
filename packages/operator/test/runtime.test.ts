import { getStorePaths, SchedulerLockBusyError } from "@dirops/core/node";
import { DiropsRuntime, normalizeDiropsConfig } from "@dirops/operator";
import { mkdtemp, writeFile } from "node:fs/promises";
import { hostname, tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, test } from "vitest";

const NOW_MS = Date.UTC(2025, 0, 10, 10);
const RUN_AT_MS = Date.UTC(2025, 0, 10, 15);
const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/identities.json", import.meta.url));

async function mkTempDir(): Promise<string> {
	return await mkdtemp(join(tmpdir(), "dirops-runtime-"));
}

const CONFIG = normalizeDiropsConfig({
	superadmin_id: "100",
	directory: { mode: "noop", fixture_path: FIXTURE_PATH },
	log: { file: false },
});

describe("DiropsRuntime", () => {
	test("scheduled jobs survive a restart", async () => {
		const storeDir = await mkTempDir();
		const first = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		const reply = await first.pipeline.handleText("100", "disable account alice");
		expect(reply.text).toBe("Deactivation of Alice Walker / alice scheduled: 2025-01-10T16:00:00+01:00 (job #1).");
		await first.stop();

		const second = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS + 60_000 });
		try {
			expect(second.recovery).toEqual({ restored: [{ job_id: 1, due_at_ms: RUN_AT_MS, overdue: false }], skipped: [] });
			expect((await second.store.get(1))?.status).toBe("scheduled");
			expect(second.scheduler.armed()).toEqual([{ job_id: 1, due_at_ms: RUN_AT_MS }]);
			expect((await second.audit.list({ action: "schedule_disable" })).map((entry) => entry.target)).toEqual([
				"alice",
			]);
		} finally {
			await second.stop();
		}
	});

	test("overdue jobs are re-armed after the startup delay", async () => {
		const storeDir = await mkTempDir();
		const first = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		await first.pipeline.handleText("100", "disable account alice");
		await first.stop();

		const lateMs = RUN_AT_MS + 60 * 60_000;
		const second = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => lateMs });
		try {
			expect(second.recovery.restored).toEqual([{ job_id: 1, due_at_ms: lateMs + 5_000, overdue: true }]);
		} finally {
			await second.stop();
		}
	});

	test("one runtime per store directory", async () => {
		const storeDir = await mkTempDir();
		const runtime = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		try {
			await expect(DiropsRuntime.start({ storeDir, config: CONFIG })).rejects.toThrow(SchedulerLockBusyError);
		} finally {
			await runtime.stop();
		}

		const again = await DiropsRuntime.start({ storeDir, config: CONFIG });
		await again.stop();
		await again.stop();
	});

	test("a lock left by a crashed process does not block restart", async () => {
		const storeDir = await mkTempDir();
		const first = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		await first.pipeline.handleText("100", "disable account alice");
		await first.stop();
		// pid far above any kernel pid_max, so no such process exists
		await writeFile(
			getStorePaths(storeDir).lockPath,
			JSON.stringify({
				pid: 2_147_483_000,
				hostname: hostname(),
				store_dir: storeDir,
				command: "serve",
				time_zone: "Europe/Berlin",
				acquired_at_ms: NOW_MS,
			}),
			"utf8",
		);

		const second = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS, command: "serve" });
		try {
			expect(second.recovery.restored).toEqual([{ job_id: 1, due_at_ms: RUN_AT_MS, overdue: false }]);
		} finally {
			await second.stop();
		}
	});

	test("admins added at runtime persist", async () => {
		const storeDir = await mkTempDir();
		const first = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		expect((await first.pipeline.handleText("100", "/admin_add 200")).text).toBe("200 added as admin.");
		await first.stop();

		const second = await DiropsRuntime.start({ storeDir, config: CONFIG, nowMs: () => NOW_MS });
		try {
			expect(await second.admins.role("200")).toBe("admin");
		} finally {
			await second.stop();
		}
	});
});
