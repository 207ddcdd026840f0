import * as path from "node:path";
import { SPD_SIZE, decodeDdr4, writeSpdFile } from "@spdkit/core";
import { requirePositional } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { progressLogger, withSession } from "../device.js";
import { summarizeRecord } from "../formatters/spd-report.js";

/**
 * `spd read <output.bin>`: dump the module to a file.
 */
export async function handleRead(ctx: CommandContext): Promise<CommandResult> {
	const output = path.resolve(ctx.cwd, requirePositional(ctx.args, 0, "output file"));

	const image = await withSession(ctx, (session) =>
		session.readImage({ onProgress: progressLogger(ctx.logger), signal: ctx.signal }),
	);
	await writeSpdFile(output, image);

	const record = decodeDdr4(image);
	for (const issue of record.issues) {
		ctx.logger.warn(issue.message, { field: issue.field });
	}

	return {
		output: `Saved ${SPD_SIZE} bytes to ${output}\n${summarizeRecord(record)}`,
		exitCode: 0,
	};
}
