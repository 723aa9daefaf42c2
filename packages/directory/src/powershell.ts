import { spawn } from "node:child_process";
import type { Identity } from "./models.js";

export type ScriptResult = {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
};

/** Runs one PowerShell script. Rejects only when the interpreter cannot be started. */
export type ScriptRunner = (script: string) => Promise<ScriptResult>;

export const MAX_SEARCH_RESULTS = 100;

/** Escapes a value for use inside a single-quoted PowerShell string literal. */
export function escapePowerShellLiteral(value: string): string {
	return value.replaceAll("`", "``").replaceAll("'", "''");
}

export function quotePowerShell(value: string): string {
	return `'${escapePowerShellLiteral(value)}'`;
}

export function buildSearchScript(query: string, searchBase: string, maxResults: number = MAX_SEARCH_RESULTS): string {
	const limit = Math.max(1, Math.trunc(maxResults));
	return [
		"Import-Module ActiveDirectory;",
		`$q = ${quotePowerShell(query)};`,
		`Get-ADUser -LDAPFilter '(objectClass=user)' -SearchBase ${quotePowerShell(searchBase)} -Properties displayName,distinguishedName,enabled,sAMAccountName |`,
		'  Where-Object { $_.displayName -like "*$q*" -or $_.sAMAccountName -like "*$q*" -or $_.Name -like "*$q*" } |',
		`  Select-Object -First ${limit} sAMAccountName, displayName, distinguishedName, Enabled |`,
		"  ConvertTo-Json -Compress",
	].join("\n");
}

export function buildDisableScript(handle: string): string {
	return [
		"Import-Module ActiveDirectory;",
		`Disable-ADAccount -Identity ${quotePowerShell(handle)};`,
		'Write-Output "OK"',
	].join("\n");
}

export function buildResetPasswordScript(handle: string, password: string, mustChangeAtLogon: boolean): string {
	const lines = [
		"Import-Module ActiveDirectory;",
		`$sam = ${quotePowerShell(handle)};`,
		`$pwd = ConvertTo-SecureString ${quotePowerShell(password)} -AsPlainText -Force;`,
		"Set-ADAccountPassword -Identity $sam -Reset -NewPassword $pwd;",
	];
	if (mustChangeAtLogon) {
		lines.push("Set-ADUser -Identity $sam -ChangePasswordAtLogon $true;");
	}
	lines.push('Write-Output "OK"');
	return lines.join("\n");
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string {
	for (const key of keys) {
		const value = record[key];
		if (typeof value === "string") {
			return value.trim();
		}
	}
	return "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses `ConvertTo-Json` output: a single object for one match, an array for
 * several, empty output for none.
 */
export function parseSearchOutput(stdout: string, maxResults: number = MAX_SEARCH_RESULTS): Identity[] {
	const trimmed = stdout.trim();
	if (!trimmed) {
		return [];
	}
	const parsed: unknown = JSON.parse(trimmed);
	const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
	const out: Identity[] = [];
	for (const item of items) {
		if (out.length >= maxResults) {
			break;
		}
		if (!isRecord(item)) {
			continue;
		}
		const handle = stringField(item, "sAMAccountName", "SamAccountName");
		if (!handle) {
			continue;
		}
		const enabled = item.Enabled ?? item.enabled;
		out.push({
			handle,
			display_name: stringField(item, "displayName", "DisplayName"),
			path: stringField(item, "distinguishedName", "DistinguishedName"),
			enabled: typeof enabled === "boolean" ? enabled : true,
		});
	}
	return out;
}

export type PowerShellRunnerOpts = {
	executable?: string;
	timeoutMs?: number;
	env?: NodeJS.ProcessEnv;
};

export function createPowerShellRunner(opts: PowerShellRunnerOpts = {}): ScriptRunner {
	const executable = opts.executable ?? "powershell";
	const timeoutMs = Math.max(1_000, Math.trunc(opts.timeoutMs ?? 120_000));
	return async (script: string): Promise<ScriptResult> =>
		await new Promise<ScriptResult>((resolve, reject) => {
			const proc = spawn(executable, ["-NoProfile", "-NonInteractive", "-Command", script], {
				env: opts.env ?? process.env,
				stdio: ["ignore", "pipe", "pipe"],
				windowsHide: true,
			});
			let stdout = "";
			let stderr = "";
			let timedOut = false;
			proc.stdout.setEncoding("utf8");
			proc.stderr.setEncoding("utf8");
			proc.stdout.on("data", (chunk: string) => {
				stdout += chunk;
			});
			proc.stderr.on("data", (chunk: string) => {
				stderr += chunk;
			});
			const timer = setTimeout(() => {
				timedOut = true;
				proc.kill("SIGKILL");
			}, timeoutMs);
			proc.on("error", (err) => {
				clearTimeout(timer);
				reject(err);
			});
			proc.on("close", (code) => {
				clearTimeout(timer);
				resolve({ exitCode: code ?? -1, stdout, stderr, timedOut });
			});
		});
}
