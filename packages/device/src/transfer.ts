import { TransferCancelledError } from "@spdkit/core";
import type { TransferPhase, TransferProgress } from "./types.js";

/** Resolve after `ms` milliseconds; zero or less resolves immediately */
export function delay(ms: number): Promise<void> {
	if (ms <= 0) {
		return Promise.resolve();
	}
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Raise TransferCancelledError if the signal has fired. Called at chunk
 * boundaries only, so a chunk is never cut in half.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, bytesProcessed: number): void {
	if (signal?.aborted) {
		throw new TransferCancelledError(bytesProcessed, { cause: signal.reason });
	}
}

export function transferProgress(
	phase: TransferPhase,
	bytesProcessed: number,
	totalBytes: number,
	page: number,
	message?: string,
): TransferProgress {
	return {
		phase,
		bytesProcessed,
		totalBytes,
		percentComplete: totalBytes > 0 ? (bytesProcessed / totalBytes) * 100 : 100,
		page,
		...(message !== undefined && { message }),
	};
}
