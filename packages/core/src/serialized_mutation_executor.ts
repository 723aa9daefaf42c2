/**
 * Promise-tail mutex. Each `run` starts after the previous one settles, whether
 * it resolved or rejected; the caller still observes its own rejection.
 */
export class SerializedMutationExecutor {
	#tail: Promise<unknown> = Promise.resolve();
	#pending = 0;

	public get pending(): number {
		return this.#pending;
	}

	public run<T>(fn: () => Promise<T> | T): Promise<T> {
		this.#pending += 1;
		const run = this.#tail.then(async () => await fn());
		this.#tail = run.then(
			() => {
				this.#pending -= 1;
			},
			() => {
				this.#pending -= 1;
			},
		);
		return run;
	}

	public async drain(): Promise<void> {
		await this.#tail;
	}
}
