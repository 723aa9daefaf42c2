import { getStorePaths, processIsAlive, SchedulerLock, SchedulerLockBusyError } from "@dirops/core/node";
import { mkdtemp, readFile, stat, writeFile } from "node:fs/promises";
import { hostname, tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

async function lockPathIn(): Promise<{ dir: string; lockPath: string }> {
	const dir = await mkdtemp(join(tmpdir(), "dirops-lock-"));
	return { dir, lockPath: getStorePaths(dir).lockPath };
}

function leftoverHolder(dir: string, overrides: Record<string, unknown> = {}): string {
	return `${JSON.stringify({
		pid: 4242,
		hostname: hostname(),
		store_dir: dir,
		command: "serve",
		time_zone: "Europe/Berlin",
		acquired_at_ms: 1,
		...overrides,
	})}\n`;
}

describe("SchedulerLock", () => {
	test("prevents two schedulers over one store", async () => {
		const { dir, lockPath } = await lockPathIn();

		const first = await SchedulerLock.acquire({ lockPath, storeDir: dir, command: "serve", timeZone: "UTC", nowMs: 10 });
		expect(JSON.parse(await readFile(lockPath, "utf8"))).toEqual({
			pid: process.pid,
			hostname: hostname(),
			store_dir: dir,
			command: "serve",
			time_zone: "UTC",
			acquired_at_ms: 10,
		});
		expect(first.reclaimed).toBeNull();

		const second = SchedulerLock.acquire({ lockPath, storeDir: dir, command: "mail", timeZone: "UTC", nowMs: 11 });
		await expect(second).rejects.toThrow(SchedulerLockBusyError);
		await expect(second).rejects.toMatchObject({ holder: { command: "serve", pid: process.pid, acquired_at_ms: 10 } });

		await first.release();
		await first.release();
		await expect(stat(lockPath)).rejects.toMatchObject({ code: "ENOENT" });

		const third = await SchedulerLock.acquire({ lockPath, storeDir: dir, command: "mail", timeZone: "UTC", nowMs: 12 });
		expect(third.holder.command).toBe("mail");
		await third.release();
	});

	test("a lock left by a dead process on this host is reclaimed", async () => {
		const { dir, lockPath } = await lockPathIn();
		await writeFile(lockPath, leftoverHolder(dir), "utf8");

		const lock = await SchedulerLock.acquire({
			lockPath,
			storeDir: dir,
			command: "serve",
			timeZone: "UTC",
			nowMs: 20,
			isAlive: (pid) => pid !== 4242,
		});

		expect(lock.reclaimed).toMatchObject({ pid: 4242, command: "serve", acquired_at_ms: 1 });
		expect(lock.holder).toMatchObject({ pid: process.pid, acquired_at_ms: 20 });
		await lock.release();
	});

	test("a live holder or a holder on another host keeps the lock", async () => {
		const { dir, lockPath } = await lockPathIn();

		await writeFile(lockPath, leftoverHolder(dir), "utf8");
		await expect(
			SchedulerLock.acquire({ lockPath, storeDir: dir, command: "serve", timeZone: "UTC", isAlive: () => true }),
		).rejects.toThrow("scheduler lock is already held by serve (pid 4242 on");

		await writeFile(lockPath, leftoverHolder(dir, { hostname: "elsewhere.invalid" }), "utf8");
		await expect(
			SchedulerLock.acquire({ lockPath, storeDir: dir, command: "serve", timeZone: "UTC", isAlive: () => false }),
		).rejects.toMatchObject({ holder: { hostname: "elsewhere.invalid" } });
	});

	test("an unreadable lock file is treated as held", async () => {
		const { dir, lockPath } = await lockPathIn();
		await writeFile(lockPath, "{", "utf8");

		await expect(
			SchedulerLock.acquire({ lockPath, storeDir: dir, command: "serve", timeZone: "UTC", isAlive: () => false }),
		).rejects.toMatchObject({ holder: null, message: `scheduler lock is already held: ${lockPath}` });
	});

	test("processIsAlive sees the current process", () => {
		expect(processIsAlive(process.pid)).toBe(true);
	});
});
