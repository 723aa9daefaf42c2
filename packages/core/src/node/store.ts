import { homedir } from "node:os";
import { join, resolve } from "node:path";

export function getDiropsHomeDir(env: NodeJS.ProcessEnv = process.env): string {
	const fromEnv = env.DIROPS_HOME?.trim();
	if (fromEnv && fromEnv.length > 0) {
		return resolve(fromEnv);
	}
	return join(homedir(), ".dirops");
}

export type StorePaths = {
	storeDir: string;
	configPath: string;
	jobsPath: string;
	auditPath: string;
	adminsPath: string;
	logPath: string;
	lockPath: string;
};

export function getStorePaths(storeDir: string = getDiropsHomeDir()): StorePaths {
	const dir = resolve(storeDir);
	return {
		storeDir: dir,
		configPath: join(dir, "config.json"),
		jobsPath: join(dir, "jobs.jsonl"),
		auditPath: join(dir, "audit.jsonl"),
		adminsPath: join(dir, "admins.jsonl"),
		logPath: join(dir, "logs", "dirops.jsonl"),
		lockPath: join(dir, "scheduler.lock"),
	};
}
