import { BtI2cProtocol } from "@spdkit/device-protocol-bt-i2c";
import { HidTransport } from "@spdkit/device-transport-hid";
import {
	type DeviceLogger,
	SpdProgrammer,
	type SpdSession,
	type TransferPhase,
	type TransferProgress,
} from "@spdkit/device";
import type { SpdkitConfig } from "./config.js";
import type { CommandContext } from "./context.js";

/** HID transport and BT-I2C protocol configured from the CLI settings */
export function createProgrammer(config: SpdkitConfig, logger: DeviceLogger): SpdProgrammer {
	const transport = new HidTransport({
		vendorId: config.device.vendorId,
		productId: config.device.productId,
		responseDelayMs: config.device.responseDelayMs,
		readTimeoutMs: config.device.readTimeoutMs,
		logger,
	});
	const protocol = new BtI2cProtocol({
		zeroPageRetries: config.protocol.zeroPageRetries,
		allowBlankPages: config.protocol.allowBlankPages,
		chunkAttempts: config.protocol.chunkAttempts,
		responseTimeoutMs: config.device.readTimeoutMs,
	});
	return new SpdProgrammer(transport, protocol, { logger });
}

/**
 * Open a session on the configured device, run `task`, and close the
 * session whatever the outcome.
 */
export async function withSession<T>(
	ctx: CommandContext,
	task: (session: SpdSession) => Promise<T>,
): Promise<T> {
	const session = await ctx.programmer().connect(ctx.config.device.deviceId);
	try {
		return await task(session);
	} finally {
		await session.close();
	}
}

const PHASE_LABELS: Readonly<Record<TransferPhase, string>> = {
	reading: "Reading",
	writing: "Writing",
	verifying: "Verifying",
};

/**
 * Progress callback that logs each phase at 25% steps.
 */
export function progressLogger(logger: DeviceLogger): (progress: TransferProgress) => void {
	const reported = new Map<TransferPhase, number>();
	return (progress) => {
		const step = Math.floor(progress.percentComplete / 25);
		if (step === 0 || step <= (reported.get(progress.phase) ?? 0)) {
			return;
		}
		reported.set(progress.phase, step);
		logger.info(`${PHASE_LABELS[progress.phase]} ${step * 25}%`, {
			bytes: progress.bytesProcessed,
			page: progress.page,
		});
	};
}
