import * as path from "node:path";
import { readSpdFile } from "@spdkit/core";
import { requirePositional } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { progressLogger, withSession } from "../device.js";
import { formatDiffReport } from "../formatters/diff-formatter.js";

/**
 * `spd verify <input.bin>`: compare the module with a file.
 * Exits 1 when they differ; each line reads `offset: file -> module`.
 */
export async function handleVerify(ctx: CommandContext): Promise<CommandResult> {
	const input = path.resolve(ctx.cwd, requirePositional(ctx.args, 0, "image file"));
	const image = await readSpdFile(input);

	const result = await withSession(ctx, (session) =>
		session.verifyImage(image, { onProgress: progressLogger(ctx.logger), signal: ctx.signal }),
	);

	if (result.matches) {
		return { output: `Module matches ${input}`, exitCode: 0 };
	}
	return {
		output: `${formatDiffReport(result.differences)}\nModule differs from ${input}`,
		exitCode: 1,
	};
}
