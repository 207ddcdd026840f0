import * as path from "node:path";
import {
	SpdDocument,
	findChecksumMismatches,
	readSpdFile,
	recomputeAllChecksums,
	writeSpdFile,
} from "@spdkit/core";
import { UsageError, requirePositional, stringFlag } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { applyFieldEdits, parseByteAssignment } from "../edit.js";
import { formatDiffReport } from "../formatters/diff-formatter.js";

/**
 * `spd edit <input.bin> [--set field=value]... [--byte offset=value]...
 * [--fix-checksums] (--output <path> | --yes)`
 *
 * Editing in place needs --yes; otherwise the result goes to --output and
 * the input stays as the backup. Every stale CRC is recomputed before
 * saving. Prints the changed bytes.
 */
export async function handleEdit(ctx: CommandContext): Promise<CommandResult> {
	const inputArg = requirePositional(ctx.args, 0, "image file");
	const input = path.resolve(ctx.cwd, inputArg);
	const outputFlag = stringFlag(ctx.args, "output");
	const output = path.resolve(ctx.cwd, outputFlag ?? inputArg);
	const fixChecksums = ctx.args.flags["fix-checksums"] === true;

	if (ctx.args.sets.length === 0 && ctx.args.bytes.length === 0 && !fixChecksums) {
		throw new UsageError(
			"Nothing to edit; pass --set field=value, --byte offset=value or --fix-checksums",
		);
	}
	if (output === input && ctx.args.flags["yes"] !== true) {
		throw new UsageError(
			`Editing in place replaces ${input}; pass --output <path>, or --yes to confirm`,
		);
	}

	const document = new SpdDocument(await readSpdFile(input), { kind: "file", path: input });

	if (ctx.args.sets.length > 0) {
		document.applyImage(applyFieldEdits(document.image, ctx.args.sets));
	}
	for (const assignment of ctx.args.bytes) {
		const [offset, value] = parseByteAssignment(assignment);
		document.setByte(offset, value);
	}
	const stale = findChecksumMismatches(document.image);
	if (stale.length > 0) {
		document.applyImage(recomputeAllChecksums(document.image));
		for (const mismatch of stale) {
			ctx.logger.info(`Recomputed ${mismatch.region} checksum`, {
				stored: mismatch.stored,
				computed: mismatch.computed,
			});
		}
	}

	const changes = document.getModifications();
	if (changes.length === 0) {
		return { output: "No bytes changed", exitCode: 0 };
	}

	await writeSpdFile(output, document.image);
	if (output === input) {
		document.confirmOverwrite();
	}
	return { output: `${formatDiffReport(changes)}\nSaved ${output}`, exitCode: 0 };
}
