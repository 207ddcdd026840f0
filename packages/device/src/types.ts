import type { ByteDifference } from "@spdkit/core";

export interface DeviceInfo {
	id: string;
	name: string; // e.g. "SPD Programmer (HID)"
	transportName: string; // e.g. "hid"
	connected: boolean;
	serialNumber?: string | undefined;
}

export type TransferPhase = "reading" | "writing" | "verifying";

export interface TransferProgress {
	phase: TransferPhase;
	bytesProcessed: number;
	totalBytes: number;
	percentComplete: number;
	/** EEPROM page (0 or 1) the last chunk belonged to */
	page: number;
	/** Human-readable status message for the current phase */
	message?: string;
}

/**
 * Minimal logging surface accepted by the device layer. A winston logger
 * satisfies it as-is.
 */
export interface DeviceLogger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
}

export interface TransferOptions {
	/** Invoked after every chunk */
	onProgress?: (progress: TransferProgress) => void;
	/** Checked between chunks; an aborted signal raises TransferCancelledError */
	signal?: AbortSignal;
	logger?: DeviceLogger;
}

export type ReadOptions = TransferOptions;

export interface WriteOptions extends TransferOptions {
	/**
	 * The image read from the module before editing. When provided, pages
	 * identical to it are neither written nor verified.
	 *
	 * Must be 512 bytes. If not provided, both pages are written.
	 */
	originalImage?: Uint8Array;
}

export interface VerifyResult {
	matches: boolean;
	/** Every offset where the module differs from the expected image */
	differences: ByteDifference[];
}

export type SessionState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "reading"
	| "writing";
