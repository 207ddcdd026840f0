import type { CommandContext, CommandResult } from "../context.js";
import { buildMarkdownTable } from "../formatters/markdown.js";

/**
 * `spd list`: programmers matching the configured VID/PID.
 * Exits 1 when none is attached.
 */
export async function handleList(ctx: CommandContext): Promise<CommandResult> {
	const devices = await ctx.programmer().listDevices();
	if (devices.length === 0) {
		const { vendorId, productId } = ctx.config.device;
		return {
			output: `No SPD programmer found (VID 0x${hex4(vendorId)}, PID 0x${hex4(productId)})`,
			exitCode: 1,
		};
	}

	const rows = devices.map((d) => [d.id, d.name, d.serialNumber ?? "-"]);
	return { output: buildMarkdownTable(["Device", "Name", "Serial"], rows), exitCode: 0 };
}

function hex4(value: number): string {
	return value.toString(16).toUpperCase().padStart(4, "0");
}
