import chalk from "chalk";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** The request is valid but needs an operator's choice before anything is scheduled. */
export const EXIT_NEEDS_OPERATOR = 2;

export type CliRunResult = {
	stdout: string;
	stderr: string;
	exitCode: number;
};

export function ok(stdout: string = ""): CliRunResult {
	return { stdout, stderr: "", exitCode: EXIT_OK };
}

/** Pretty JSON on stdout, for commands run with `--json` or by other tools. */
export function jsonResult(data: unknown, exitCode: number = EXIT_OK): CliRunResult {
	return { stdout: `${JSON.stringify(data, null, 2)}\n`, stderr: "", exitCode };
}

/** Hints are full dirops command lines the operator can run next. */
export function cliError(message: string, hints: readonly string[] = []): CliRunResult {
	const lines = [`${chalk.red("dirops:")} ${message}`];
	for (const hint of hints) {
		lines.push(`  ${chalk.dim("try")} ${chalk.cyan(hint)}`);
	}
	return { stdout: "", stderr: `${lines.join("\n")}\n`, exitCode: EXIT_FAILURE };
}

export type CliArgSpec = {
	/** Flags that take a value, as `--flag v` or `--flag=v`. */
	values?: readonly string[];
	switches?: readonly string[];
};

/**
 * Flags of one subcommand. Anything starting with `--` that the spec does not
 * name is collected in `unknown` so the command can refuse it.
 */
export class CliArgs {
	readonly #values = new Map<string, string>();
	readonly #switches = new Set<string>();
	public readonly positional: string[] = [];
	public readonly unknown: string[] = [];

	public constructor(argv: readonly string[], spec: CliArgSpec = {}) {
		const valueFlags = new Set(spec.values ?? []);
		const switchFlags = new Set(["--help", "-h", ...(spec.switches ?? [])]);
		for (let i = 0; i < argv.length; i++) {
			const arg = argv[i] ?? "";
			const eq = arg.indexOf("=");
			const name = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
			if (valueFlags.has(name)) {
				if (name !== arg) {
					this.#values.set(name, arg.slice(eq + 1));
				} else {
					this.#values.set(name, argv[i + 1] ?? "");
					i += 1;
				}
			} else if (switchFlags.has(arg)) {
				this.#switches.add(arg === "-h" ? "--help" : arg);
			} else if (arg.startsWith("--")) {
				this.unknown.push(name);
			} else {
				this.positional.push(arg);
			}
		}
	}

	public get help(): boolean {
		return this.#switches.has("--help");
	}

	public has(name: string): boolean {
		return this.#switches.has(name);
	}

	/** Null when absent; a blank value counts as absent. */
	public value(name: string): string | null {
		const raw = this.#values.get(name)?.trim();
		return raw ? raw : null;
	}

	/** Raw value, whitespace kept; for message bodies. */
	public text(name: string): string | null {
		return this.#values.get(name) ?? null;
	}

	public rejectUnknown(command: string): CliRunResult | null {
		const [first] = this.unknown;
		return first ? cliError(`unknown flag for ${command}: ${first}`, [`dirops ${command} --help`]) : null;
	}
}
