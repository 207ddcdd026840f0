import winston from "winston";
import type { SpdkitConfig } from "./config.js";

export interface CreateLoggerOptions {
	/** Discard all output (tests) */
	silent?: boolean;
}

const LEVELS = ["error", "warn", "info", "debug"];

/**
 * Logger for the CLI and the device layer. Everything goes to stderr so
 * that reports on stdout can be piped.
 *
 * `simple` prints `level: message {meta}`; `json` prints one object per
 * line with a timestamp.
 */
export function createLogger(
	config: SpdkitConfig["logging"],
	options: CreateLoggerOptions = {},
): winston.Logger {
	const errors = winston.format.errors({ stack: config.level === "debug" });

	const format =
		config.format === "json"
			? winston.format.combine(winston.format.timestamp(), errors, winston.format.json())
			: winston.format.combine(
					errors,
					winston.format.printf(({ level, message, stack, ...meta }) => {
						const text = typeof stack === "string" ? stack : String(message);
						const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
						return `${level}: ${text}${extra}`;
					}),
				);

	return winston.createLogger({
		level: config.level,
		format,
		silent: options.silent ?? false,
		transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
		exitOnError: false,
	});
}
