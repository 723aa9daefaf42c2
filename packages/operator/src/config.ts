import { type LogLevel, normalizeLogLevel, resolveTimeZone } from "@dirops/core";
import { getStorePaths } from "@dirops/core/node";
import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export type DirectoryMode = "powershell" | "noop";

export type DiropsConfig = {
	version: 1;
	timezone: string;
	superadmin_id: string | null;
	schedule: {
		default_hour: number;
		default_minute: number;
		overdue_delay_ms: number;
		action_timeout_ms: number;
		max_timer_delay_ms: number;
	};
	sessions: {
		/** Null keeps selections open until used. */
		ttl_ms: number | null;
	};
	directory: {
		mode: DirectoryMode;
		search_base: string;
		executable: string;
		fixture_path: string | null;
		search_limit: number;
	};
	log: {
		level: LogLevel;
		file: boolean;
	};
};

export function defaultDiropsConfig(): DiropsConfig {
	return {
		version: 1,
		timezone: "Europe/Berlin",
		superadmin_id: null,
		schedule: {
			default_hour: 16,
			default_minute: 0,
			overdue_delay_ms: 5_000,
			action_timeout_ms: 120_000,
			max_timer_delay_ms: 60_000,
		},
		sessions: {
			ttl_ms: 15 * 60_000,
		},
		directory: {
			mode: "powershell",
			search_base: "DC=corp,DC=local",
			executable: "powershell",
			fixture_path: null,
			search_limit: 10,
		},
		log: {
			level: "info",
			file: true,
		},
	};
}

const UnknownRecordSchema = z.record(z.string(), z.unknown());

function asRecord(value: unknown): Record<string, unknown> | null {
	if (!value || typeof value !== "object" || Array.isArray(value)) {
		return null;
	}
	const parsed = UnknownRecordSchema.safeParse(value);
	return parsed.success ? parsed.data : null;
}

function normalizeNullableString(value: unknown): string | null {
	if (value == null) return null;
	if (typeof value !== "string") return null;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

function normalizeString(value: unknown, fallback: string): string {
	return normalizeNullableString(value) ?? fallback;
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
	if (typeof value === "boolean") return value;
	if (typeof value === "string") {
		const normalized = value.trim().toLowerCase();
		if (["1", "true", "yes", "on", "enabled"].includes(normalized)) return true;
		if (["0", "false", "no", "off", "disabled"].includes(normalized)) return false;
	}
	return fallback;
}

function normalizeInteger(value: unknown, fallback: number, opts: { min?: number; max?: number } = {}): number {
	const min = opts.min ?? Number.NEGATIVE_INFINITY;
	const max = opts.max ?? Number.POSITIVE_INFINITY;
	const clamp = (next: number): number => Math.min(max, Math.max(min, Math.trunc(next)));

	if (typeof value === "number" && Number.isFinite(value)) {
		return clamp(value);
	}
	if (typeof value === "string") {
		const parsed = Number.parseInt(value.trim(), 10);
		if (Number.isFinite(parsed)) {
			return clamp(parsed);
		}
	}
	return clamp(fallback);
}

/** `null`, `"off"` and `0` disable the TTL. */
function normalizeTtl(value: unknown, fallback: number | null): number | null {
	if (value === null) return null;
	if (typeof value === "string" && ["", "off", "none", "null"].includes(value.trim().toLowerCase())) return null;
	if (value === 0 || value === "0") return null;
	if (value === undefined) return fallback;
	return normalizeInteger(value, fallback ?? 15 * 60_000, { min: 1_000 });
}

function normalizeDirectoryMode(value: unknown, fallback: DirectoryMode): DirectoryMode {
	if (typeof value !== "string") return fallback;
	switch (value.trim().toLowerCase()) {
		case "powershell":
			return "powershell";
		case "noop":
			return "noop";
		default:
			return fallback;
	}
}

export function normalizeDiropsConfig(input: unknown): DiropsConfig {
	const next = defaultDiropsConfig();
	const root = asRecord(input);
	if (!root) return next;

	if ("timezone" in root) {
		next.timezone = resolveTimeZone(root.timezone) ?? next.timezone;
	}
	if ("superadmin_id" in root) {
		next.superadmin_id =
			typeof root.superadmin_id === "number" ? String(root.superadmin_id) : normalizeNullableString(root.superadmin_id);
	}

	const schedule = asRecord(root.schedule);
	if (schedule) {
		next.schedule.default_hour = normalizeInteger(schedule.default_hour, next.schedule.default_hour, {
			min: 0,
			max: 23,
		});
		next.schedule.default_minute = normalizeInteger(schedule.default_minute, next.schedule.default_minute, {
			min: 0,
			max: 59,
		});
		next.schedule.overdue_delay_ms = normalizeInteger(schedule.overdue_delay_ms, next.schedule.overdue_delay_ms, {
			min: 0,
			max: 10 * 60_000,
		});
		next.schedule.action_timeout_ms = normalizeInteger(schedule.action_timeout_ms, next.schedule.action_timeout_ms, {
			min: 1_000,
			max: 60 * 60_000,
		});
		next.schedule.max_timer_delay_ms = normalizeInteger(
			schedule.max_timer_delay_ms,
			next.schedule.max_timer_delay_ms,
			{ min: 1_000, max: 24 * 60 * 60_000 },
		);
	}

	const sessions = asRecord(root.sessions);
	if (sessions && "ttl_ms" in sessions) {
		next.sessions.ttl_ms = normalizeTtl(sessions.ttl_ms, next.sessions.ttl_ms);
	}

	const directory = asRecord(root.directory);
	if (directory) {
		next.directory.mode = normalizeDirectoryMode(directory.mode, next.directory.mode);
		next.directory.search_base = normalizeString(directory.search_base, next.directory.search_base);
		next.directory.executable = normalizeString(directory.executable, next.directory.executable);
		if ("fixture_path" in directory) {
			next.directory.fixture_path = normalizeNullableString(directory.fixture_path);
		}
		next.directory.search_limit = normalizeInteger(directory.search_limit, next.directory.search_limit, {
			min: 1,
			max: 50,
		});
	}

	const log = asRecord(root.log);
	if (log) {
		next.log.level = normalizeLogLevel(log.level, next.log.level);
		next.log.file = normalizeBoolean(log.file, next.log.file);
	}

	return next;
}

/** `DIROPS_*` variables win over the file. Unset or blank variables are ignored. */
export function applyEnvOverrides(base: DiropsConfig, env: NodeJS.ProcessEnv = process.env): DiropsConfig {
	const next = normalizeDiropsConfig(base);
	const read = (name: string): string | null => normalizeNullableString(env[name]);

	const timezone = read("DIROPS_TIMEZONE");
	if (timezone) {
		next.timezone = resolveTimeZone(timezone) ?? next.timezone;
	}
	const superadmin = read("DIROPS_SUPERADMIN_ID");
	if (superadmin) {
		next.superadmin_id = superadmin;
	}
	const mode = read("DIROPS_DIRECTORY_MODE");
	if (mode) {
		next.directory.mode = normalizeDirectoryMode(mode, next.directory.mode);
	}
	const searchBase = read("DIROPS_SEARCH_BASE");
	if (searchBase) {
		next.directory.search_base = searchBase;
	}
	const fixture = read("DIROPS_FIXTURE_PATH");
	if (fixture) {
		next.directory.fixture_path = fixture;
	}
	const hour = read("DIROPS_DEFAULT_HOUR");
	if (hour) {
		next.schedule.default_hour = normalizeInteger(hour, next.schedule.default_hour, { min: 0, max: 23 });
	}
	const level = read("DIROPS_LOG_LEVEL");
	if (level) {
		next.log.level = normalizeLogLevel(level, next.log.level);
	}
	const ttl = env.DIROPS_SESSION_TTL_MS;
	if (ttl != null && ttl.trim().length > 0) {
		next.sessions.ttl_ms = normalizeTtl(ttl, next.sessions.ttl_ms);
	}
	return next;
}

export function getDiropsConfigPath(storeDir: string): string {
	return getStorePaths(storeDir).configPath;
}

export async function readDiropsConfigFile(storeDir: string): Promise<DiropsConfig> {
	const path = getDiropsConfigPath(storeDir);
	try {
		const raw = await readFile(path, "utf8");
		const parsed: unknown = JSON.parse(raw);
		return normalizeDiropsConfig(parsed);
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return defaultDiropsConfig();
		}
		throw err;
	}
}

export async function writeDiropsConfigFile(storeDir: string, config: DiropsConfig): Promise<string> {
	const path = getDiropsConfigPath(storeDir);
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, `${JSON.stringify(normalizeDiropsConfig(config), null, 2)}\n`, "utf8");
	await chmod(path, 0o600);
	return path;
}

export async function loadDiropsConfig(
	storeDir: string,
	env: NodeJS.ProcessEnv = process.env,
): Promise<DiropsConfig> {
	return applyEnvOverrides(await readDiropsConfigFile(storeDir), env);
}
