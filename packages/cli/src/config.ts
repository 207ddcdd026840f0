/**
 * Configuration for the spd command-line tool.
 *
 * Sources, highest priority first:
 * 1. CLI flags (--vid, --pid, --device, --log-level, --log-format,
 *    --zero-page-retries, --allow-blank-pages)
 * 2. Environment variables (SPDKIT_VID, SPDKIT_PID, SPDKIT_LOG_LEVEL,
 *    SPDKIT_LOG_FORMAT)
 * 3. spdkit.config.json in the working directory (or --config <path>)
 * 4. Defaults
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_PRODUCT_ID, DEFAULT_VENDOR_ID } from "@spdkit/device-transport-hid";
import { z } from "zod";
import { type ParsedArgs, parseArgs } from "./args.js";

export const CONFIG_FILE_NAME = "spdkit.config.json";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export const LogFormatSchema = z.enum(["simple", "json"]);

// Accepts numbers and numeric strings such as "0x0483"
const UsbIdSchema = z.coerce.number().int().min(0).max(0xffff);

export const DeviceConfigSchema = z.object({
	vendorId: UsbIdSchema.default(DEFAULT_VENDOR_ID),
	productId: UsbIdSchema.default(DEFAULT_PRODUCT_ID),
	/** Device id from `spd list`; the first matching programmer when unset */
	deviceId: z.string().min(1).optional(),
	responseDelayMs: z.coerce.number().int().min(0).default(20),
	readTimeoutMs: z.coerce.number().int().min(1).default(1000),
});

export const ProtocolConfigSchema = z.object({
	zeroPageRetries: z.coerce.number().int().min(0).max(10).default(2),
	allowBlankPages: z.boolean().default(false),
	chunkAttempts: z.coerce.number().int().min(1).max(10).default(3),
});

export const LoggingConfigSchema = z.object({
	level: LogLevelSchema.default("info"),
	format: LogFormatSchema.default("simple"),
});

export const ConfigSchema = z.object({
	device: DeviceConfigSchema.default({}),
	protocol: ProtocolConfigSchema.default({}),
	logging: LoggingConfigSchema.default({}),
});

/** Shape of spdkit.config.json: every key optional, unknown keys rejected */
export const ConfigFileSchema = z
	.object({
		device: DeviceConfigSchema.partial().strict().optional(),
		protocol: ProtocolConfigSchema.partial().strict().optional(),
		logging: LoggingConfigSchema.partial().strict().optional(),
	})
	.strict();

export type SpdkitConfig = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

/** One configuration source before validation */
interface ConfigLayer {
	device?: Record<string, unknown>;
	protocol?: Record<string, unknown>;
	logging?: Record<string, unknown>;
}

/** Configuration could not be read or failed validation */
export class ConfigError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ConfigError";
	}
}

export interface LoadConfigOptions {
	/** Arguments after the executable and script */
	argv: readonly string[];
	env: Readonly<Record<string, string | undefined>>;
	cwd: string;
}

/**
 * Load configuration from all sources.
 *
 * @throws ConfigError naming the first invalid setting
 *
 * @example
 * ```typescript
 * const config = loadConfig({ argv: process.argv.slice(2), env: process.env, cwd: process.cwd() });
 * config.device.vendorId; // => 0x0483 unless overridden
 * ```
 */
export function loadConfig(options: LoadConfigOptions): SpdkitConfig {
	const args = parseArgs(options.argv);
	const file = readConfigFile(args, options.cwd);
	const merged = mergeLayers(file, envLayer(options.env), cliLayer(args));

	const result = ConfigSchema.safeParse(merged);
	if (!result.success) {
		throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`, {
			cause: result.error,
		});
	}
	return result.data;
}

function cliLayer(args: ParsedArgs): ConfigLayer {
	const flag = (name: string) => {
		const value = args.flags[name];
		return typeof value === "string" ? value : undefined;
	};
	return {
		device: defined({
			vendorId: flag("vid"),
			productId: flag("pid"),
			deviceId: flag("device"),
		}),
		protocol: defined({
			zeroPageRetries: flag("zero-page-retries"),
			allowBlankPages: args.flags["allow-blank-pages"] === true ? true : undefined,
		}),
		logging: defined({
			level: flag("log-level"),
			format: flag("log-format"),
		}),
	};
}

function envLayer(env: Readonly<Record<string, string | undefined>>): ConfigLayer {
	const value = (name: string) => {
		const raw = env[name];
		return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
	};
	return {
		device: defined({
			vendorId: value("SPDKIT_VID"),
			productId: value("SPDKIT_PID"),
		}),
		logging: defined({
			level: value("SPDKIT_LOG_LEVEL"),
			format: value("SPDKIT_LOG_FORMAT"),
		}),
	};
}

/**
 * Read the JSON config file. A missing default file is not an error; a
 * missing file named with --config is.
 */
function readConfigFile(args: ParsedArgs, cwd: string): ConfigLayer {
	const explicit = args.flags["config"];
	const configPath = path.resolve(
		cwd,
		typeof explicit === "string" ? explicit : CONFIG_FILE_NAME,
	);

	if (!fs.existsSync(configPath)) {
		if (typeof explicit === "string") {
			throw new ConfigError(`Config file not found: ${configPath}`);
		}
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
	} catch (err) {
		throw new ConfigError(
			`${configPath}: ${err instanceof Error ? err.message : String(err)}`,
			{ cause: err },
		);
	}

	const result = ConfigFileSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(`${configPath}: ${describeIssues(result.error)}`, {
			cause: result.error,
		});
	}
	return result.data;
}

function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
	const merged: ConfigLayer = {};
	for (const layer of layers) {
		merged.device = { ...merged.device, ...layer.device };
		merged.protocol = { ...merged.protocol, ...layer.protocol };
		merged.logging = { ...merged.logging, ...layer.logging };
	}
	return merged;
}

/** Drop keys whose value is undefined so they do not mask lower layers */
function defined(values: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
		)
		.join("; ");
}
