import { Logger, MemoryLogSink } from "@dirops/core";
import { JobTimerRegistry } from "@dirops/scheduler";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const START_MS = Date.UTC(2025, 0, 10, 9);

describe("JobTimerRegistry", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(START_MS);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	test("fires once at the due time and forgets the entry", async () => {
		const timers = new JobTimerRegistry();
		const fired: number[] = [];
		timers.arm({ jobId: 1, dueAtMs: START_MS + 1_000, onDue: () => void fired.push(Date.now()) });

		await vi.advanceTimersByTimeAsync(999);
		expect(fired).toEqual([]);
		expect(timers.has(1)).toBe(true);

		await vi.advanceTimersByTimeAsync(1);
		await timers.idle();
		expect(fired).toEqual([START_MS + 1_000]);
		expect(timers.has(1)).toBe(false);

		await vi.advanceTimersByTimeAsync(10_000);
		expect(fired).toHaveLength(1);
	});

	test("long delays are split into chunks without firing early", async () => {
		const timers = new JobTimerRegistry({ maxDelayMs: 1_000 });
		let fired = 0;
		timers.arm({ jobId: 1, dueAtMs: START_MS + 3_500, onDue: () => void fired++ });

		await vi.advanceTimersByTimeAsync(3_499);
		expect(fired).toBe(0);

		await vi.advanceTimersByTimeAsync(1);
		await timers.idle();
		expect(fired).toBe(1);
	});

	test("a forward clock jump is picked up at the next chunk", async () => {
		const timers = new JobTimerRegistry({ maxDelayMs: 60_000 });
		let fired = 0;
		timers.arm({ jobId: 1, dueAtMs: START_MS + 600_000, onDue: () => void fired++ });

		vi.setSystemTime(START_MS + 600_000);
		await vi.advanceTimersByTimeAsync(60_000);
		await timers.idle();

		expect(fired).toBe(1);
	});

	test("arming an armed id replaces its timer", async () => {
		const timers = new JobTimerRegistry();
		const calls: string[] = [];
		timers.arm({ jobId: 1, dueAtMs: START_MS + 1_000, onDue: () => void calls.push("first") });
		timers.arm({ jobId: 1, dueAtMs: START_MS + 2_000, onDue: () => void calls.push("second") });

		expect(timers.size).toBe(1);
		expect(timers.dueAt(1)).toBe(START_MS + 2_000);

		await vi.advanceTimersByTimeAsync(2_000);
		await timers.idle();
		expect(calls).toEqual(["second"]);
	});

	test("disarm cancels a pending timer", async () => {
		const timers = new JobTimerRegistry();
		let fired = 0;
		timers.arm({ jobId: 1, dueAtMs: START_MS + 1_000, onDue: () => void fired++ });

		expect(timers.disarm(1)).toBe(true);
		expect(timers.disarm(1)).toBe(false);

		await vi.advanceTimersByTimeAsync(5_000);
		expect(fired).toBe(0);
	});

	test("a past due time fires on the next tick", async () => {
		const timers = new JobTimerRegistry();
		let fired = 0;
		timers.arm({ jobId: 1, dueAtMs: START_MS - 60_000, onDue: () => void fired++ });

		await vi.advanceTimersByTimeAsync(0);
		await timers.idle();
		expect(fired).toBe(1);
	});

	test("callback errors are logged", async () => {
		const sink = new MemoryLogSink();
		const timers = new JobTimerRegistry({ logger: new Logger({ sinks: [sink.write] }) });
		timers.arm({
			jobId: 4,
			dueAtMs: START_MS + 10,
			onDue: () => {
				throw new Error("boom");
			},
		});

		await vi.advanceTimersByTimeAsync(10);
		await timers.idle();

		expect(sink.find("job timer callback failed")[0]?.fields).toEqual({
			job_id: 4,
			error: "boom",
			error_name: "Error",
		});
	});

	test("idle waits for running callbacks", async () => {
		const timers = new JobTimerRegistry();
		let finished = false;
		timers.arm({
			jobId: 1,
			dueAtMs: START_MS,
			onDue: async () => {
				await Promise.resolve();
				finished = true;
			},
		});

		await vi.advanceTimersByTimeAsync(0);
		await timers.idle();
		expect(finished).toBe(true);
	});

	test("list is ordered by due time and stop clears everything", async () => {
		const timers = new JobTimerRegistry();
		let fired = 0;
		timers.arm({ jobId: 3, dueAtMs: START_MS + 2_000, onDue: () => void fired++ });
		timers.arm({ jobId: 1, dueAtMs: START_MS + 5_000, onDue: () => void fired++ });
		timers.arm({ jobId: 2, dueAtMs: START_MS + 2_000, onDue: () => void fired++ });

		expect(timers.list()).toEqual([
			{ job_id: 2, due_at_ms: START_MS + 2_000 },
			{ job_id: 3, due_at_ms: START_MS + 2_000 },
			{ job_id: 1, due_at_ms: START_MS + 5_000 },
		]);

		timers.stop();
		await vi.advanceTimersByTimeAsync(10_000);
		expect(timers.size).toBe(0);
		expect(fired).toBe(0);
	});
});
