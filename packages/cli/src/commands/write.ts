import * as path from "node:path";
import {
	decodeDdr4,
	diffImages,
	findChecksumMismatches,
	readSpdFile,
	recomputeAllChecksums,
	writeSpdFile,
} from "@spdkit/core";
import { computeChangedPages } from "@spdkit/device";
import { UsageError, requirePositional, stringFlag } from "../args.js";
import type { CommandContext, CommandResult } from "../context.js";
import { progressLogger, withSession } from "../device.js";

/**
 * `spd write <input.bin> --yes [--fix-checksums] [--backup <path>]`
 *
 * An image with a stale CRC is refused (ChecksumMismatchError) unless
 * --fix-checksums recomputes it first. The module is read and saved to the
 * backup file before anything is written. Only pages that differ from the
 * backup are written.
 */
export async function handleWrite(ctx: CommandContext): Promise<CommandResult> {
	const input = path.resolve(ctx.cwd, requirePositional(ctx.args, 0, "image file"));
	let image = await readSpdFile(input);

	if (ctx.args.flags["yes"] !== true) {
		throw new UsageError(
			"Writing replaces the SPD contents of the module; pass --yes to confirm",
		);
	}

	const [stale] = findChecksumMismatches(image);
	if (stale) {
		if (ctx.args.flags["fix-checksums"] !== true) {
			throw stale;
		}
		image = recomputeAllChecksums(image);
		ctx.logger.info(`Recomputed checksums of ${path.basename(input)}`);
	}

	const record = decodeDdr4(image);
	for (const issue of record.issues) {
		ctx.logger.warn(`${path.basename(input)}: ${issue.message}`, { field: issue.field });
	}

	const backupPath = path.resolve(
		ctx.cwd,
		stringFlag(ctx.args, "backup") ?? backupFileName(ctx.now()),
	);
	const onProgress = progressLogger(ctx.logger);

	return withSession(ctx, async (session) => {
		const original = await session.readImage({ onProgress, signal: ctx.signal });
		await writeSpdFile(backupPath, original);
		ctx.logger.info(`Backup saved to ${backupPath}`);

		const pages = computeChangedPages(original, image);
		if (pages.length === 0) {
			return {
				output: `Backup saved to ${backupPath}\nModule already matches ${input}; nothing written`,
				exitCode: 0,
			};
		}

		await session.writeImage(image, {
			originalImage: original,
			onProgress,
			signal: ctx.signal,
		});

		const changed = diffImages(original, image).length;
		return {
			output: [
				`Backup saved to ${backupPath}`,
				`Wrote ${input}: ${changed} byte${changed === 1 ? "" : "s"} changed on page ${pages.join(", ")}, verified`,
			].join("\n"),
			exitCode: 0,
		};
	});
}

/**
 * @example
 * backupFileName(new Date("2024-03-05T14:07:09Z")); // => "spd-backup-20240305-140709.bin"
 */
export function backupFileName(now: Date): string {
	const stamp = now
		.toISOString()
		.slice(0, 19)
		.replace(/[-:]/g, "")
		.replace("T", "-");
	return `spd-backup-${stamp}.bin`;
}
