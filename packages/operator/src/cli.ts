import { errorMessage, Logger, type LogSink, zonedCalendarDate } from "@dirops/core";
import {
	consoleLogSink,
	FsJsonlStore,
	getDiropsHomeDir,
	getStorePaths,
	JsonlLogSink,
	SchedulerLockBusyError,
} from "@dirops/core/node";
import { AuditLog, DurableJobStore, JobStatusSchema } from "@dirops/scheduler";
import chalk from "chalk";
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import {
	CliArgs,
	cliError,
	type CliRunResult,
	EXIT_FAILURE,
	EXIT_NEEDS_OPERATOR,
	jsonResult,
	ok,
} from "./cli_primitives.js";
import { formatJobLine } from "./commands.js";
import {
	type DiropsConfig,
	defaultDiropsConfig,
	getDiropsConfigPath,
	loadDiropsConfig,
	writeDiropsConfigFile,
} from "./config.js";
import { extractOffboardingNotice, type MailOffboardingEvent, parseMailMessage } from "./mail.js";
import type { MailDecision } from "./pipeline.js";
import { type Reply, textReply } from "./reply.js";
import { DiropsRuntime } from "./runtime.js";

type CliWriter = {
	write: (chunk: string) => void;
};

export type CliIO = {
	stdout?: CliWriter;
	stderr?: CliWriter;
	stdin?: NodeJS.ReadableStream;
};

export type RunOpts = {
	io?: CliIO;
	env?: NodeJS.ProcessEnv;
	nowMs?: () => number;
	registerSignalHandler?: (signal: NodeJS.Signals, handler: () => void) => () => void;
};

type CliCtx = {
	storeDir: string;
	env: NodeJS.ProcessEnv;
	nowMs: () => number;
	stdout: CliWriter;
	stderr: CliWriter;
	stdin: NodeJS.ReadableStream;
	registerSignalHandler: (signal: NodeJS.Signals, handler: () => void) => () => void;
};

function mainHelp(): string {
	return [
		`${chalk.bold.magenta("dirops")} ${chalk.dim("- deferred directory actions for trusted operators")}`,
		"",
		"Usage:",
		"  dirops [--store <dir>] <command> [args...]",
		"",
		"Commands:",
		"  serve [--as <principal>]      Interactive operator console",
		"  jobs [--status <s>] [--json]  List jobs",
		"  audit [--action <a>] [--target <t>] [--json]",
		"  mail --subject <s> (--body <text> | --body-file <path>) [--handle <h>]",
		"  config init|show|path",
		"",
		`Store directory: --store, DIROPS_HOME, or ${chalk.cyan("~/.dirops")}`,
	].join("\n");
}

function defaultRegisterSignalHandler(signal: NodeJS.Signals, handler: () => void): () => void {
	process.on(signal, handler);
	return () => {
		process.off(signal, handler);
	};
}

function createLogger(ctx: CliCtx, config: DiropsConfig): { logger: Logger; flush: () => Promise<void> } {
	const sinks: LogSink[] = [consoleLogSink({ stdout: ctx.stderr, stderr: ctx.stderr })];
	let fileSink: JsonlLogSink | null = null;
	if (config.log.file) {
		fileSink = new JsonlLogSink(getStorePaths(ctx.storeDir).logPath);
		sinks.push(fileSink.write);
	}
	const logger = new Logger({ component: "dirops", level: config.log.level, sinks, nowMs: ctx.nowMs });
	return {
		logger,
		flush: async () => {
			await fileSink?.flush();
		},
	};
}

function describeStartError(err: unknown): CliRunResult {
	if (err instanceof SchedulerLockBusyError) {
		const holder = err.holder;
		if (holder) {
			return cliError(
				`dirops ${holder.command} (pid ${holder.pid} on ${holder.hostname}) is already running the scheduler for ${holder.store_dir}`,
				["dirops jobs", "dirops audit"],
			);
		}
		return cliError(`${err.lockPath} is held but unreadable; remove it once no dirops process is running`);
	}
	return cliError(errorMessage(err));
}

export function formatReply(reply: Reply): string {
	const lines = [reply.text];
	reply.choices.forEach((choice, index) => {
		lines.push(`  ${chalk.cyan(`[${index + 1}]`)} ${choice.label}`);
	});
	return `${lines.join("\n")}\n`;
}

function mailReply(decision: MailDecision): Reply {
	switch (decision.kind) {
		case "scheduled": {
			const verb = decision.replaced ? "was already scheduled; request updated" : "scheduled";
			return textReply(
				`Offboarding mail: deactivation of ${decision.job.target_handle} ${verb}: ${decision.job.run_at} (job #${decision.job.job_id}).`,
			);
		}
		case "needs_selection":
			return decision.reply;
		case "ambiguous":
			return textReply(
				`Offboarding mail: several matches for "${decision.query}": ${decision.candidates.map((c) => c.handle).join(", ")}.`,
			);
		case "not_found":
			return textReply(`Offboarding mail: no directory match for "${decision.query}".`);
		case "rejected":
			return textReply(`Offboarding mail rejected: ${decision.reason}.`);
	}
}

/** `:mail <file>` inside serve; a selection it opens stays answerable in this session. */
async function intakeMailFile(path: string, runtime: DiropsRuntime, ctx: CliCtx): Promise<Reply> {
	let raw: string;
	try {
		raw = await readFile(path, "utf8");
	} catch (err) {
		return textReply(`Mail file could not be read: ${errorMessage(err)}`);
	}
	const message = parseMailMessage(raw);
	const event = extractOffboardingNotice({
		...message,
		today: zonedCalendarDate(ctx.nowMs(), runtime.config.timezone),
	});
	if (!event) {
		return textReply("Not an offboarding notice.");
	}
	return mailReply(await runtime.pipeline.handleMailOffboarding(event));
}

const MAIL_DIRECTIVE = /^:mail\s+(.+)$/;

async function cmdServe(argv: string[], ctx: CliCtx): Promise<CliRunResult> {
	const args = new CliArgs(argv, { values: ["--as"] });
	if (args.help) {
		return ok(
			[
				"dirops serve - interactive operator console",
				"",
				"Usage:",
				"  dirops serve [--as <principal>]",
				"",
				"Type requests or /commands. Answer a numbered choice with its number.",
				"`:mail <file>` hands a saved offboarding mail to the pipeline.",
				"The principal defaults to the configured superadmin.",
			].join("\n") + "\n",
		);
	}
	const rejected = args.rejectUnknown("serve");
	if (rejected) {
		return rejected;
	}
	const config = await loadDiropsConfig(ctx.storeDir, ctx.env);
	const principal = args.value("--as") ?? config.superadmin_id;
	if (!principal) {
		return cliError("no principal: pass --as <id> or configure superadmin_id", [
			"dirops serve --as <id>",
			"dirops config init",
		]);
	}

	const { logger, flush } = createLogger(ctx, config);
	let runtime: DiropsRuntime;
	try {
		runtime = await DiropsRuntime.start({ storeDir: ctx.storeDir, config, logger, nowMs: ctx.nowMs, command: "serve" });
	} catch (err) {
		await flush();
		return describeStartError(err);
	}

	const rl = createInterface({ input: ctx.stdin, terminal: false });
	const unregister = ctx.registerSignalHandler("SIGINT", () => {
		rl.close();
	});
	ctx.stdout.write(
		`${chalk.bold.magenta("dirops")} ${chalk.dim(`as ${principal}, ${runtime.recovery.restored.length} job(s) restored`)}\n`,
	);

	let lastReply: Reply | null = null;
	try {
		for await (const rawLine of rl) {
			const line = rawLine.trim();
			if (!line) {
				continue;
			}
			if (line === "exit" || line === "quit") {
				break;
			}
			const mailPath = MAIL_DIRECTIVE.exec(line)?.[1]?.trim();
			const choice = /^\d+$/.test(line) ? lastReply?.choices[Number.parseInt(line, 10) - 1] : undefined;
			let reply: Reply;
			if (mailPath) {
				reply = await intakeMailFile(mailPath, runtime, ctx);
			} else if (choice) {
				reply = await runtime.pipeline.handleSelection(principal, choice.payload);
			} else {
				reply = await runtime.pipeline.handleText(principal, line);
			}
			lastReply = reply;
			ctx.stdout.write(formatReply(reply));
		}
	} finally {
		unregister();
		rl.close();
		await runtime.stop();
		await flush();
	}
	return ok();
}

async function cmdJobs(argv: string[], ctx: CliCtx): Promise<CliRunResult> {
	const args = new CliArgs(argv, { values: ["--status"], switches: ["--json"] });
	if (args.help) {
		return ok("dirops jobs - list jobs\n\nUsage:\n  dirops jobs [--status scheduled|done|failed] [--json]\n");
	}
	const rejected = args.rejectUnknown("jobs");
	if (rejected) {
		return rejected;
	}
	const statusRaw = args.value("--status");
	const status = statusRaw == null ? null : JobStatusSchema.safeParse(statusRaw.toLowerCase());
	if (status && !status.success) {
		return cliError(`invalid status: ${statusRaw}`, ["dirops jobs --status scheduled"]);
	}
	const config = await loadDiropsConfig(ctx.storeDir, ctx.env);
	const store = new DurableJobStore({ path: getStorePaths(ctx.storeDir).jobsPath, timeZone: config.timezone });
	const jobs = await store.list({ status: status?.data ?? null });
	if (args.has("--json")) {
		return jsonResult(jobs);
	}
	if (jobs.length === 0) {
		return ok("No jobs.\n");
	}
	return ok(`${jobs.map((job) => `${formatJobLine(job)} ${chalk.dim(job.status)}`).join("\n")}\n`);
}

async function cmdAudit(argv: string[], ctx: CliCtx): Promise<CliRunResult> {
	const args = new CliArgs(argv, { values: ["--action", "--target"], switches: ["--json"] });
	if (args.help) {
		return ok("dirops audit - list audit entries\n\nUsage:\n  dirops audit [--action <a>] [--target <t>] [--json]\n");
	}
	const rejected = args.rejectUnknown("audit");
	if (rejected) {
		return rejected;
	}
	const config = await loadDiropsConfig(ctx.storeDir, ctx.env);
	const audit = new AuditLog({
		store: new FsJsonlStore(getStorePaths(ctx.storeDir).auditPath, { lenient: true }),
		timeZone: config.timezone,
	});
	const entries = await audit.list({ action: args.value("--action"), target: args.value("--target") });
	if (args.has("--json")) {
		return jsonResult(entries);
	}
	if (entries.length === 0) {
		return ok("No audit entries.\n");
	}
	const lines = entries.map(
		(entry) => `${chalk.dim(entry.ts)} ${entry.actor ?? "system"} ${chalk.cyan(entry.action)} ${entry.target ?? "-"}`,
	);
	return ok(`${lines.join("\n")}\n`);
}

async function cmdMail(argv: string[], ctx: CliCtx): Promise<CliRunResult> {
	const args = new CliArgs(argv, { values: ["--subject", "--body", "--body-file", "--handle"] });
	if (args.help) {
		return ok(
			[
				"dirops mail - schedule the deactivation an offboarding mail announces",
				"",
				"Usage:",
				"  dirops mail --subject <s> (--body <text> | --body-file <path>) [--handle <h>]",
				"",
				"A name with several directory matches exits with 2 and lists them;",
				"rerun with --handle, or pass the mail to `dirops serve` as `:mail <file>`.",
			].join("\n") + "\n",
		);
	}
	const rejected = args.rejectUnknown("mail");
	if (rejected) {
		return rejected;
	}
	const bodyFile = args.value("--body-file");
	const body = bodyFile ? await readFile(bodyFile, "utf8") : (args.text("--body") ?? "");
	const config = await loadDiropsConfig(ctx.storeDir, ctx.env);
	const notice = extractOffboardingNotice({
		subject: args.text("--subject") ?? "",
		body,
		today: zonedCalendarDate(ctx.nowMs(), config.timezone),
	});
	if (!notice) {
		return jsonResult({ kind: "ignored", reason: "not an offboarding notice" });
	}
	const handle = args.value("--handle");
	const event: MailOffboardingEvent = handle ? { ...notice, handle } : notice;

	const { logger, flush } = createLogger(ctx, config);
	let runtime: DiropsRuntime;
	try {
		runtime = await DiropsRuntime.start({ storeDir: ctx.storeDir, config, logger, nowMs: ctx.nowMs, command: "mail" });
	} catch (err) {
		await flush();
		return describeStartError(err);
	}
	try {
		// No selection is opened: this process exits before anyone could answer it.
		const decision = await runtime.pipeline.handleMailOffboarding(event, { openSelection: false });
		switch (decision.kind) {
			case "scheduled":
				return jsonResult({ kind: decision.kind, job: decision.job, replaced: decision.replaced });
			case "ambiguous":
				return jsonResult(
					{
						kind: decision.kind,
						query: decision.query,
						candidates: decision.candidates.map((identity) => ({
							handle: identity.handle,
							display_name: identity.display_name,
						})),
					},
					EXIT_NEEDS_OPERATOR,
				);
			case "needs_selection":
				return jsonResult({ kind: decision.kind, text: decision.reply.text }, EXIT_NEEDS_OPERATOR);
			case "not_found":
			case "rejected":
				return jsonResult(decision, EXIT_FAILURE);
		}
	} finally {
		await runtime.stop();
		await flush();
	}
}

async function cmdConfig(argv: string[], ctx: CliCtx): Promise<CliRunResult> {
	const sub = argv[0] ?? "show";
	switch (sub) {
		case "path":
			return ok(`${getDiropsConfigPath(ctx.storeDir)}\n`);
		case "show":
			return jsonResult(await loadDiropsConfig(ctx.storeDir, ctx.env));
		case "init": {
			const path = await writeDiropsConfigFile(ctx.storeDir, defaultDiropsConfig());
			return ok(`wrote ${path}\n`);
		}
		default:
			return cliError(`unknown config subcommand: ${sub}`, ["dirops config show"]);
	}
}

/** `--store` is read only before the command name. */
function splitStoreFlag(argv: readonly string[]): { storeFlag: string | null; rest: string[] } {
	let storeFlag: string | null = null;
	let i = 0;
	while (i < argv.length) {
		const arg = argv[i] ?? "";
		if (arg === "--store") {
			storeFlag = argv[i + 1] ?? "";
			i += 2;
		} else if (arg.startsWith("--store=")) {
			storeFlag = arg.slice("--store=".length);
			i += 1;
		} else {
			break;
		}
	}
	return { storeFlag, rest: argv.slice(i) };
}

export async function run(argv: string[], opts: RunOpts = {}): Promise<CliRunResult> {
	if (argv.length === 0 || argv[0] === "--help" || argv[0] === "-h") {
		return ok(`${mainHelp()}\n`);
	}
	const env = opts.env ?? process.env;
	const { storeFlag, rest } = splitStoreFlag(argv);
	const ctx: CliCtx = {
		storeDir: storeFlag?.trim() || getDiropsHomeDir(env),
		env,
		nowMs: opts.nowMs ?? Date.now,
		stdout: opts.io?.stdout ?? process.stdout,
		stderr: opts.io?.stderr ?? process.stderr,
		stdin: opts.io?.stdin ?? process.stdin,
		registerSignalHandler: opts.registerSignalHandler ?? defaultRegisterSignalHandler,
	};

	const cmd = rest[0] ?? "";
	const args = rest.slice(1);
	switch (cmd) {
		case "serve":
			return await cmdServe(args, ctx);
		case "jobs":
			return await cmdJobs(args, ctx);
		case "audit":
			return await cmdAudit(args, ctx);
		case "mail":
			return await cmdMail(args, ctx);
		case "config":
			return await cmdConfig(args, ctx);
		default:
			return cliError(`unknown command: ${cmd}`, ["dirops --help"]);
	}
}
