import { type Logger, silentLogger } from "@dirops/core";
import { FsJsonlStore, getStorePaths, SchedulerLock, type StorePaths } from "@dirops/core/node";
import {
	type ActionExecutor,
	createPowerShellRunner,
	IdentityResolver,
	type IdentitySearch,
	loadIdentityFixture,
	NoopActionExecutor,
	PowerShellActionExecutor,
	PowerShellIdentitySearch,
	StaticIdentitySearch,
} from "@dirops/directory";
import {
	AuditLog,
	DurableJobStore,
	JobExecutor,
	JobScheduler,
	JobTimerRegistry,
	RecoveryBootstrapper,
	type RecoveryReport,
} from "@dirops/scheduler";
import { AdminRoster } from "./admins.js";
import { OperatorConsole } from "./commands.js";
import type { DiropsConfig } from "./config.js";
import { RequestPipeline } from "./pipeline.js";
import { DisambiguationSessions } from "./sessions.js";

export type DiropsRuntimeOpts = {
	storeDir: string;
	config: DiropsConfig;
	logger?: Logger;
	nowMs?: () => number;
	/** Recorded in the scheduler lock; defaults to "runtime". */
	command?: string;
	/** Overrides the backend chosen by `config.directory.mode`. */
	search?: IdentitySearch;
	actions?: ActionExecutor;
};

type DirectoryBackend = {
	search: IdentitySearch;
	actions: ActionExecutor;
};

async function createDirectoryBackend(config: DiropsConfig, logger: Logger): Promise<DirectoryBackend> {
	if (config.directory.mode === "noop") {
		const identities = config.directory.fixture_path ? await loadIdentityFixture(config.directory.fixture_path) : [];
		logger.info("directory backend: noop", { identities: identities.length });
		return { search: new StaticIdentitySearch(identities), actions: new NoopActionExecutor() };
	}
	const runner = createPowerShellRunner({
		executable: config.directory.executable,
		timeoutMs: config.schedule.action_timeout_ms,
	});
	logger.info("directory backend: powershell", { search_base: config.directory.search_base });
	return {
		search: new PowerShellIdentitySearch({ runner, searchBase: config.directory.search_base }),
		actions: new PowerShellActionExecutor({ runner, logger: logger.child("actions") }),
	};
}

/**
 * Process-wide composition: one store, one scheduler, one audit log. `start`
 * takes the scheduler lock, restores persisted jobs and only then accepts new ones.
 */
export class DiropsRuntime {
	public readonly paths: StorePaths;
	public readonly config: DiropsConfig;
	public readonly store: DurableJobStore;
	public readonly audit: AuditLog;
	public readonly admins: AdminRoster;
	public readonly scheduler: JobScheduler;
	public readonly sessions: DisambiguationSessions;
	public readonly pipeline: RequestPipeline;
	public readonly recovery: RecoveryReport;
	readonly #lock: SchedulerLock;
	readonly #logger: Logger;
	#stopped = false;

	private constructor(opts: {
		paths: StorePaths;
		config: DiropsConfig;
		store: DurableJobStore;
		audit: AuditLog;
		admins: AdminRoster;
		scheduler: JobScheduler;
		sessions: DisambiguationSessions;
		pipeline: RequestPipeline;
		recovery: RecoveryReport;
		lock: SchedulerLock;
		logger: Logger;
	}) {
		this.paths = opts.paths;
		this.config = opts.config;
		this.store = opts.store;
		this.audit = opts.audit;
		this.admins = opts.admins;
		this.scheduler = opts.scheduler;
		this.sessions = opts.sessions;
		this.pipeline = opts.pipeline;
		this.recovery = opts.recovery;
		this.#lock = opts.lock;
		this.#logger = opts.logger;
	}

	public static async start(opts: DiropsRuntimeOpts): Promise<DiropsRuntime> {
		const config = opts.config;
		const logger = opts.logger ?? silentLogger();
		const nowMs = opts.nowMs ?? Date.now;
		const paths = getStorePaths(opts.storeDir);

		const lock = await SchedulerLock.acquire({
			lockPath: paths.lockPath,
			storeDir: paths.storeDir,
			command: opts.command ?? "runtime",
			timeZone: config.timezone,
			nowMs: nowMs(),
		});
		if (lock.reclaimed) {
			logger.warn("stale scheduler lock reclaimed", {
				pid: lock.reclaimed.pid,
				command: lock.reclaimed.command,
				acquired_at_ms: lock.reclaimed.acquired_at_ms,
			});
		}
		let scheduler: JobScheduler | null = null;
		try {
			const backend = await createDirectoryBackend(config, logger.child("directory"));
			const search = opts.search ?? backend.search;
			const actions = opts.actions ?? backend.actions;

			const store = new DurableJobStore({ path: paths.jobsPath, timeZone: config.timezone, nowMs });
			const audit = new AuditLog({
				store: new FsJsonlStore(paths.auditPath, { lenient: true }),
				logger: logger.child("audit"),
				timeZone: config.timezone,
				nowMs,
			});
			const admins = new AdminRoster({
				store: new FsJsonlStore(paths.adminsPath, { lenient: true }),
				superadmin: config.superadmin_id,
				logger: logger.child("admins"),
				nowMs,
			});
			const executor = new JobExecutor({
				store,
				actions,
				audit,
				logger: logger.child("executor"),
				actionTimeoutMs: config.schedule.action_timeout_ms,
			});
			const timers = new JobTimerRegistry({
				nowMs,
				maxDelayMs: config.schedule.max_timer_delay_ms,
				logger: logger.child("timers"),
			});
			scheduler = new JobScheduler({ store, executor, timers, logger: logger.child("scheduler") });
			const sessions = new DisambiguationSessions({ ttlMs: config.sessions.ttl_ms, nowMs });
			const operatorConsole = new OperatorConsole({
				admins,
				store,
				scheduler,
				audit,
				logger: logger.child("console"),
			});
			const pipeline = new RequestPipeline({
				admins,
				console: operatorConsole,
				resolver: new IdentityResolver({
					search,
					logger: logger.child("resolver"),
					defaultLimit: config.directory.search_limit,
				}),
				sessions,
				scheduler,
				actions,
				audit,
				timeZone: config.timezone,
				defaultHour: config.schedule.default_hour,
				defaultMinute: config.schedule.default_minute,
				logger: logger.child("pipeline"),
				nowMs,
			});

			await store.load();
			const recovery = await new RecoveryBootstrapper({
				store,
				scheduler,
				logger: logger.child("recovery"),
				nowMs,
				overdueDelayMs: config.schedule.overdue_delay_ms,
			}).restoreOnStartup();
			scheduler.open();
			logger.info("runtime started", { store_dir: paths.storeDir, timezone: config.timezone });

			return new DiropsRuntime({
				paths,
				config,
				store,
				audit,
				admins,
				scheduler,
				sessions,
				pipeline,
				recovery,
				lock,
				logger,
			});
		} catch (err) {
			scheduler?.stop();
			await lock.release();
			throw err;
		}
	}

	/** Stops accepting jobs, waits for running executions, then releases the lock. */
	public async stop(): Promise<void> {
		if (this.#stopped) {
			return;
		}
		this.#stopped = true;
		this.scheduler.stop();
		try {
			await this.scheduler.idle();
		} finally {
			await this.#lock.release();
		}
		this.#logger.info("runtime stopped");
	}
}
