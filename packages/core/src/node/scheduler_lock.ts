import type { FileHandle } from "node:fs/promises";
import { mkdir, open, readFile, rm } from "node:fs/promises";
import { hostname } from "node:os";
import { dirname } from "node:path";
import { z } from "zod";

export const SchedulerLockHolderSchema = z.object({
	pid: z.number().int(),
	hostname: z.string().min(1),
	store_dir: z.string().min(1),
	/** CLI command that started the scheduler, e.g. "serve". */
	command: z.string().min(1),
	time_zone: z.string().min(1),
	acquired_at_ms: z.number().int(),
});
export type SchedulerLockHolder = z.infer<typeof SchedulerLockHolderSchema>;

function errnoCode(err: unknown): string | null {
	return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : null;
}

/** Signal 0 checks for a process without touching it; EPERM still means it exists. */
export function processIsAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		return errnoCode(err) === "EPERM";
	}
}

async function readHolder(lockPath: string): Promise<SchedulerLockHolder | null> {
	let raw: string;
	try {
		raw = await readFile(lockPath, "utf8");
	} catch (err) {
		if (errnoCode(err) === "ENOENT") {
			return null;
		}
		throw err;
	}
	let json: unknown = null;
	try {
		json = JSON.parse(raw);
	} catch (err) {
		if (!(err instanceof SyntaxError)) {
			throw err;
		}
	}
	const parsed = SchedulerLockHolderSchema.safeParse(json);
	return parsed.success ? parsed.data : null;
}

export class SchedulerLockBusyError extends Error {
	public readonly lockPath: string;
	/** Null when the lock file is empty or unreadable. */
	public readonly holder: SchedulerLockHolder | null;

	public constructor(lockPath: string, holder: SchedulerLockHolder | null) {
		const by = holder ? ` by ${holder.command} (pid ${holder.pid} on ${holder.hostname})` : "";
		super(`scheduler lock is already held${by}: ${lockPath}`);
		this.name = "SchedulerLockBusyError";
		this.lockPath = lockPath;
		this.holder = holder;
	}
}

export type AcquireSchedulerLockOpts = {
	lockPath: string;
	storeDir: string;
	command: string;
	timeZone: string;
	nowMs?: number;
	/** Defaults to the current process. */
	pid?: number;
	isAlive?: (pid: number) => boolean;
};

/**
 * One scheduler per store directory. A lock left behind by a crashed process
 * on this host is reclaimed once; any other holder makes `acquire` throw.
 */
export class SchedulerLock {
	readonly #lockPath: string;
	readonly #handle: FileHandle;
	readonly #holder: SchedulerLockHolder;
	readonly #reclaimed: SchedulerLockHolder | null;
	#released = false;

	private constructor(
		lockPath: string,
		handle: FileHandle,
		holder: SchedulerLockHolder,
		reclaimed: SchedulerLockHolder | null,
	) {
		this.#lockPath = lockPath;
		this.#handle = handle;
		this.#holder = holder;
		this.#reclaimed = reclaimed;
	}

	public get path(): string {
		return this.#lockPath;
	}

	public get holder(): SchedulerLockHolder {
		return { ...this.#holder };
	}

	/** The dead holder whose lock was taken over, if any. */
	public get reclaimed(): SchedulerLockHolder | null {
		return this.#reclaimed ? { ...this.#reclaimed } : null;
	}

	public static async acquire(opts: AcquireSchedulerLockOpts): Promise<SchedulerLock> {
		const lockPath = opts.lockPath;
		const isAlive = opts.isAlive ?? processIsAlive;
		const holder = SchedulerLockHolderSchema.parse({
			pid: opts.pid ?? process.pid,
			hostname: hostname(),
			store_dir: opts.storeDir,
			command: opts.command,
			time_zone: opts.timeZone,
			acquired_at_ms: Math.trunc(opts.nowMs ?? Date.now()),
		});
		await mkdir(dirname(lockPath), { recursive: true });

		let handle: FileHandle | null = null;
		let reclaimed: SchedulerLockHolder | null = null;
		while (handle === null) {
			try {
				handle = await open(lockPath, "wx", 0o600);
			} catch (err) {
				if (errnoCode(err) !== "EEXIST") {
					throw err;
				}
				const existing = await readHolder(lockPath);
				const stale =
					reclaimed === null &&
					existing !== null &&
					existing.hostname === holder.hostname &&
					!isAlive(existing.pid);
				if (!stale) {
					throw new SchedulerLockBusyError(lockPath, existing);
				}
				reclaimed = existing;
				await rm(lockPath, { force: true });
			}
		}

		try {
			await handle.writeFile(`${JSON.stringify(holder)}\n`, { encoding: "utf8" });
		} catch (err) {
			await handle.close();
			await rm(lockPath, { force: true });
			throw err;
		}
		return new SchedulerLock(lockPath, handle, holder, reclaimed);
	}

	public async release(): Promise<void> {
		if (this.#released) {
			return;
		}
		this.#released = true;
		try {
			await this.#handle.close();
		} finally {
			await rm(this.#lockPath, { force: true });
		}
	}
}
