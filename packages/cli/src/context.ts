import type { SpdProgrammer } from "@spdkit/device";
import type winston from "winston";
import type { ParsedArgs } from "./args.js";
import type { SpdkitConfig } from "./config.js";

/** Everything a command handler needs */
export interface CommandContext {
	args: ParsedArgs;
	config: SpdkitConfig;
	logger: winston.Logger;
	cwd: string;
	now: () => Date;
	/** Fires on Ctrl+C; transfers stop at the next chunk */
	signal: AbortSignal | undefined;
	/** Programmer for device commands, created on first use */
	programmer: () => SpdProgrammer;
}

export interface CommandResult {
	/** Printed on stdout */
	output: string;
	exitCode: number;
}

export type CommandHandler = (ctx: CommandContext) => Promise<CommandResult>;
