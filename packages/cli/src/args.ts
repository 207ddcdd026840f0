/**
 * Command-line argument parsing.
 *
 * Accepts `--name value`, `--name=value` and bare boolean switches. `--set`
 * and `--byte` may repeat; every other flag keeps its last value.
 */

export interface ParsedArgs {
	command: string | undefined;
	positionals: string[];
	flags: Record<string, string | true>;
	/** `--set field=value` assignments, in order */
	sets: string[];
	/** `--byte offset=value` assignments, in order */
	bytes: string[];
}

/** Bad invocation; reported with the usage text and exit code 2 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

const BOOLEAN_FLAGS = new Set(["yes", "help", "allow-blank-pages", "fix-checksums"]);

const ALIASES: Readonly<Record<string, string>> = {
	"-y": "yes",
	"-h": "help",
	"-o": "output",
	"-d": "device",
	"-f": "format",
};

/**
 * @example
 * parseArgs(["info", "dump.bin", "--format", "json"]);
 * // => { command: "info", positionals: ["dump.bin"], flags: { format: "json" }, ... }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const positionals: string[] = [];
	const flags: Record<string, string | true> = {};
	const sets: string[] = [];
	const bytes: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) continue;

		if (arg === "--") {
			positionals.push(...argv.slice(i + 1));
			break;
		}

		let name: string | undefined;
		let inline: string | undefined;
		if (arg.startsWith("--")) {
			const eq = arg.indexOf("=");
			name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
			inline = eq === -1 ? undefined : arg.slice(eq + 1);
		} else if (arg.startsWith("-") && arg.length > 1) {
			name = ALIASES[arg];
			if (name === undefined) {
				throw new UsageError(`Unknown option ${arg}`);
			}
		}

		if (name === undefined) {
			positionals.push(arg);
			continue;
		}

		if (BOOLEAN_FLAGS.has(name)) {
			if (inline !== undefined) {
				throw new UsageError(`--${name} does not take a value`);
			}
			flags[name] = true;
			continue;
		}

		let value = inline;
		if (value === undefined) {
			value = argv[i + 1];
			if (value === undefined || value.startsWith("--")) {
				throw new UsageError(`--${name} needs a value`);
			}
			i++;
		}

		if (name === "set") {
			sets.push(value);
		} else if (name === "byte") {
			bytes.push(value);
		} else {
			flags[name] = value;
		}
	}

	const [command, ...rest] = positionals;
	return { command, positionals: rest, flags, sets, bytes };
}

/** String value of a flag, or undefined when absent */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
	const value = args.flags[name];
	if (value === true) {
		throw new UsageError(`--${name} needs a value`);
	}
	return value;
}

/** Split `key=value`; the value may itself contain `=` */
export function splitAssignment(assignment: string, flag: string): [string, string] {
	const eq = assignment.indexOf("=");
	if (eq <= 0) {
		throw new UsageError(`--${flag} expects key=value, got "${assignment}"`);
	}
	return [assignment.slice(0, eq).trim(), assignment.slice(eq + 1).trim()];
}

/** Positional argument at `index`, or a usage error naming it */
export function requirePositional(args: ParsedArgs, index: number, label: string): string {
	const value = args.positionals[index];
	if (value === undefined) {
		throw new UsageError(`Missing ${label}`);
	}
	return value;
}
