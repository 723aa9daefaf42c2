import { errorMessage, type Logger, silentLogger } from "@dirops/core";
import { type ActionResult, type DirectoryAction, isValidHandle } from "./models.js";
import { buildDisableScript, buildResetPasswordScript, type ScriptResult, type ScriptRunner } from "./powershell.js";

/** Performs one directory mutation. Implementations report failure in the result. */
export interface ActionExecutor {
	performAction(action: DirectoryAction): Promise<ActionResult>;
}

function scriptFor(action: DirectoryAction): string {
	switch (action.kind) {
		case "disable_account":
			return buildDisableScript(action.handle);
		case "reset_password":
			return buildResetPasswordScript(action.handle, action.password, action.mustChangeAtLogon);
	}
}

function firstLine(text: string): string {
	return text.trim().split(/\r?\n/)[0]?.trim() ?? "";
}

export class PowerShellActionExecutor implements ActionExecutor {
	readonly #runner: ScriptRunner;
	readonly #logger: Logger;

	public constructor(opts: { runner: ScriptRunner; logger?: Logger }) {
		this.#runner = opts.runner;
		this.#logger = opts.logger ?? silentLogger();
	}

	public async performAction(action: DirectoryAction): Promise<ActionResult> {
		if (!isValidHandle(action.handle)) {
			return { ok: false, reason: `invalid handle: ${JSON.stringify(action.handle)}` };
		}
		let result: ScriptResult;
		try {
			result = await this.#runner(scriptFor(action));
		} catch (err) {
			this.#logger.error("powershell could not be started", { action: action.kind, handle: action.handle });
			return { ok: false, reason: `powershell unavailable: ${errorMessage(err)}` };
		}
		if (result.timedOut) {
			return { ok: false, reason: "powershell timed out" };
		}
		if (result.exitCode !== 0) {
			const detail = firstLine(result.stderr);
			return { ok: false, reason: `powershell exited with ${result.exitCode}${detail ? `: ${detail}` : ""}` };
		}
		this.#logger.info("directory action applied", { action: action.kind, handle: action.handle });
		return { ok: true, output: firstLine(result.stdout) || "OK" };
	}
}

export type PerformedAction = { kind: DirectoryAction["kind"]; handle: string };

/** Records actions without touching a directory. */
export class NoopActionExecutor implements ActionExecutor {
	readonly #performed: PerformedAction[] = [];
	readonly #failures: ReadonlyMap<string, string>;

	public constructor(opts: { failures?: Record<string, string> } = {}) {
		this.#failures = new Map(Object.entries(opts.failures ?? {}));
	}

	public get performed(): readonly PerformedAction[] {
		return this.#performed;
	}

	public async performAction(action: DirectoryAction): Promise<ActionResult> {
		this.#performed.push({ kind: action.kind, handle: action.handle });
		const failure = this.#failures.get(action.handle);
		if (failure) {
			return { ok: false, reason: failure };
		}
		return { ok: true, output: "noop" };
	}
}
