import { InMemoryJsonlStore, SerializedMutationExecutor } from "@dirops/core";
import { describe, expect, test } from "vitest";

describe("SerializedMutationExecutor", () => {
	test("runs tasks one at a time in submission order", async () => {
		const executor = new SerializedMutationExecutor();
		const order: string[] = [];
		let releaseFirst: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			releaseFirst = resolve;
		});

		const first = executor.run(async () => {
			await gate;
			order.push("first");
			return 1;
		});
		const second = executor.run(() => {
			order.push("second");
			return 2;
		});
		expect(executor.pending).toBe(2);

		releaseFirst();
		expect(await Promise.all([first, second])).toEqual([1, 2]);
		expect(order).toEqual(["first", "second"]);
		await executor.drain();
		expect(executor.pending).toBe(0);
	});

	test("a rejected task does not block the next one", async () => {
		const executor = new SerializedMutationExecutor();
		await expect(
			executor.run(async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");
		expect(await executor.run(() => "after")).toBe("after");
	});
});

test("InMemoryJsonlStore keeps rows in append order", async () => {
	const store = new InMemoryJsonlStore<{ n: number }>([{ n: 1 }]);
	await store.append({ n: 2 });
	expect(await store.read()).toEqual([{ n: 1 }, { n: 2 }]);
	expect(store.size).toBe(2);
	await store.write([{ n: 9 }]);
	expect(await store.read()).toEqual([{ n: 9 }]);
});
