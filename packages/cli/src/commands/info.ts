import * as path from "node:path";
import { decodeDdr4, decodeXmp, inferDieType, readSpdFile } from "@spdkit/core";
import { UsageError, stringFlag } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { progressLogger, withSession } from "../device.js";
import {
	type SpdReportInput,
	formatInfoJson,
	formatInfoReport,
} from "../formatters/spd-report.js";

const FORMATS = ["yaml", "json"] as const;

/**
 * `spd info [file.bin] [--format yaml|json]`
 *
 * Decodes a file, or the module in the programmer when no file is given.
 */
export async function handleInfo(ctx: CommandContext): Promise<CommandResult> {
	const requested = stringFlag(ctx.args, "format") ?? "yaml";
	const format = FORMATS.find((f) => f === requested);
	if (!format) {
		throw new UsageError(`--format must be yaml or json, got "${requested}"`);
	}

	const file = ctx.args.positionals[0];
	const { image, source } = file
		? { image: await readSpdFile(path.resolve(ctx.cwd, file)), source: file }
		: await withSession(ctx, async (session) => ({
				image: await session.readImage({
					onProgress: progressLogger(ctx.logger),
					signal: ctx.signal,
				}),
				source: session.deviceInfo.name,
			}));

	const record = decodeDdr4(image);
	const input: SpdReportInput = {
		source,
		record,
		xmp: decodeXmp(image),
		die: inferDieType(record.partNumber, record.manufacturer.name),
	};

	return {
		output: format === "json" ? formatInfoJson(input) : formatInfoReport(input),
		exitCode: 0,
	};
}
