import * as path from "node:path";
import { diffImages, readSpdFile } from "@spdkit/core";
import { requirePositional } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { formatDiffReport } from "../formatters/diff-formatter.js";

/**
 * `spd diff <a.bin> <b.bin>`: exits 1 when the images differ.
 */
export async function handleDiff(ctx: CommandContext): Promise<CommandResult> {
	const first = requirePositional(ctx.args, 0, "first image file");
	const second = requirePositional(ctx.args, 1, "second image file");

	const a = await readSpdFile(path.resolve(ctx.cwd, first));
	const b = await readSpdFile(path.resolve(ctx.cwd, second));

	const differences = diffImages(a, b);
	return { output: formatDiffReport(differences), exitCode: differences.length === 0 ? 0 : 1 };
}
