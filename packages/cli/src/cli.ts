import { ChecksumMismatchError, TransferCancelledError } from "@spdkit/core";
import type { SpdProgrammer } from "@spdkit/device";
import type winston from "winston";
import { type ParsedArgs, UsageError, parseArgs } from "./args.js";
import { handleDiff } from "./commands/diff.js";
import { handleEdit } from "./commands/edit.js";
import { handleInfo } from "./commands/info.js";
import { handleList } from "./commands/list.js";
import { handleRead } from "./commands/read.js";
import { handleVerify } from "./commands/verify.js";
import { handleWrite } from "./commands/write.js";
import { type SpdkitConfig, loadConfig } from "./config.js";
import type { CommandContext, CommandHandler } from "./context.js";
import { createProgrammer } from "./device.js";
import { createLogger } from "./logger.js";

export const USAGE = `Usage: spd <command> [options]

Commands:
  list                         List attached SPD programmers
  read <out.bin>               Read the module into a file
  write <in.bin> --yes         Back up the module, then write a file to it
  verify <in.bin>              Compare the module with a file
  info [file.bin]              Decode a file (or the module) as YAML and tables
  edit <in.bin> --set f=v      Edit fields or raw bytes of an image file
  diff <a.bin> <b.bin>         List bytes that differ between two images

Options:
  --vid <id>, --pid <id>       USB identifiers of the programmer
  -d, --device <id>            Device id from \`spd list\`
  --zero-page-retries <n>      Re-reads of a page that comes back all zeros
  --allow-blank-pages          Accept a page that stays all zeros
  --backup <path>              Backup file for write
  -o, --output <path>          Output file for edit (in-place edits need --yes)
  -f, --format <yaml|json>     Output format for info
  --byte <offset=value>        Raw byte edit (repeatable)
  --fix-checksums              Recompute stale CRCs (write refuses them otherwise)
  --log-level <level>          debug, info, warn or error
  --log-format <format>        simple or json
  --config <path>              Config file (default ./spdkit.config.json)
  -y, --yes                    Confirm a write or an in-place edit
  -h, --help                   Show this text
`;

const COMMANDS: Readonly<Record<string, CommandHandler>> = {
	list: handleList,
	read: handleRead,
	write: handleWrite,
	verify: handleVerify,
	info: handleInfo,
	edit: handleEdit,
	diff: handleDiff,
};

export interface CliIo {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	env: Readonly<Record<string, string | undefined>>;
	cwd: string;
	signal?: AbortSignal;
	now?: () => Date;
	/** Replaces the stderr logger */
	logger?: winston.Logger;
	/** Replaces the HID programmer */
	createProgrammer?: (config: SpdkitConfig, logger: winston.Logger) => SpdProgrammer;
}

/**
 * Run one CLI invocation.
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code: 0 success, 1 failure or difference found,
 *   2 usage error or stale checksum, 130 cancelled
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
	let args: ParsedArgs;
	let config: SpdkitConfig;
	try {
		args = parseArgs(argv);
		config = loadConfig({ argv, env: io.env, cwd: io.cwd });
	} catch (err) {
		io.stderr(`Error: ${messageOf(err)}\n`);
		return 2;
	}

	if (args.flags["help"] === true) {
		io.stdout(USAGE);
		return 0;
	}
	if (args.command === undefined) {
		io.stderr(USAGE);
		return 2;
	}
	const handler = Object.hasOwn(COMMANDS, args.command) ? COMMANDS[args.command] : undefined;
	if (!handler) {
		io.stderr(`Unknown command "${args.command}"\n\n${USAGE}`);
		return 2;
	}

	const logger = io.logger ?? createLogger(config.logging);
	const makeProgrammer = io.createProgrammer ?? createProgrammer;
	let programmer: SpdProgrammer | undefined;

	const ctx: CommandContext = {
		args,
		config,
		logger,
		cwd: io.cwd,
		now: io.now ?? (() => new Date()),
		signal: io.signal,
		programmer: () => {
			programmer ??= makeProgrammer(config, logger);
			return programmer;
		},
	};

	try {
		const result = await handler(ctx);
		if (result.output) {
			io.stdout(`${result.output}\n`);
		}
		return result.exitCode;
	} catch (err) {
		io.stderr(`Error: ${messageOf(err)}\n`);
		if (err instanceof UsageError) {
			return 2;
		}
		if (err instanceof ChecksumMismatchError) {
			io.stderr("Pass --fix-checksums to recompute it before writing\n");
			return 2;
		}
		if (err instanceof Error && err.cause !== undefined) {
			logger.debug("Caused by", { cause: messageOf(err.cause) });
		}
		return err instanceof TransferCancelledError ? 130 : 1;
	}
}

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
