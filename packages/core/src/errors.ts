/**
 * Error taxonomy shared by the codec, the parsers and the device layer.
 *
 * Every failure raised by spdkit is an {@link SpdError} (discriminated by
 * `code`) except {@link FieldRangeError}, which extends the built-in
 * `RangeError` so that callers can keep using `instanceof RangeError`.
 */

export type SpdErrorCode =
	| "DeviceNotFound"
	| "DeviceBusy"
	| "ReadFault"
	| "WriteVerificationFailed"
	| "InvalidFileSize"
	| "InvalidImageSize"
	| "UnsupportedFormat"
	| "ChecksumMismatch"
	| "EncodingError"
	| "TransferCancelled"
	| "SessionClosed";

export interface SpdErrorOptions {
	cause?: unknown;
}

/** Base class for every spdkit failure */
export class SpdError extends Error {
	readonly code: SpdErrorCode;

	constructor(code: SpdErrorCode, message: string, options?: SpdErrorOptions) {
		super(message, options);
		this.name = `${code}Error`;
		this.code = code;
	}
}

/** No HID device matched the configured vendor/product identifiers */
export class DeviceNotFoundError extends SpdError {
	readonly vendorId: number;
	readonly productId: number;

	constructor(vendorId: number, productId: number, options?: SpdErrorOptions) {
		super(
			"DeviceNotFound",
			`No SPD programmer found with VID 0x${hex4(vendorId)} / PID 0x${hex4(productId)}`,
			options,
		);
		this.vendorId = vendorId;
		this.productId = productId;
	}
}

/**
 * The device is held by another process, or the session already has a
 * transfer in flight.
 */
export class DeviceBusyError extends SpdError {
	constructor(message: string, options?: SpdErrorOptions) {
		super("DeviceBusy", message, options);
	}
}

/** A page could not be read (malformed replies or repeated all-zero data) */
export class ReadFaultError extends SpdError {
	readonly page: number;
	readonly offset: number | undefined;
	readonly attempts: number;

	constructor(
		message: string,
		details: { page: number; offset?: number; attempts: number },
		options?: SpdErrorOptions,
	) {
		super("ReadFault", message, options);
		this.page = details.page;
		this.offset = details.offset;
		this.attempts = details.attempts;
	}
}

/** Read-back after a page write differs from the bytes that were sent */
export class WriteVerificationFailedError extends SpdError {
	/** Absolute image offset (0-511) of the first mismatching byte */
	readonly offset: number;
	readonly expected: number;
	readonly actual: number;

	constructor(offset: number, expected: number, actual: number) {
		super(
			"WriteVerificationFailed",
			`Write verification failed at offset 0x${hex3(offset)}: expected 0x${hex2(expected)}, read back 0x${hex2(actual)}`,
		);
		this.offset = offset;
		this.expected = expected;
		this.actual = actual;
	}
}

/** A `.bin` file is not exactly one SPD image long */
export class InvalidFileSizeError extends SpdError {
	readonly path: string;
	readonly size: number;

	constructor(path: string, size: number, expected: number) {
		super(
			"InvalidFileSize",
			`${path} is ${size} bytes; an SPD image must be exactly ${expected} bytes`,
		);
		this.path = path;
		this.size = size;
	}
}

/** An in-memory buffer is not exactly one SPD image long */
export class InvalidImageSizeError extends SpdError {
	readonly size: number;

	constructor(size: number, expected: number) {
		super(
			"InvalidImageSize",
			`SPD image must be exactly ${expected} bytes, got ${size}`,
		);
		this.size = size;
	}
}

/** DRAM device type byte is not the DDR4 sentinel */
export class UnsupportedFormatError extends SpdError {
	readonly deviceType: number;

	constructor(deviceType: number) {
		super(
			"UnsupportedFormat",
			`Unsupported DRAM device type 0x${hex2(deviceType)} (expected DDR4, 0x0C)`,
		);
		this.deviceType = deviceType;
	}
}

/** Stored CRC does not match the CRC computed over its covered range */
export class ChecksumMismatchError extends SpdError {
	readonly region: string;
	readonly stored: number;
	readonly computed: number;

	constructor(region: string, stored: number, computed: number) {
		super(
			"ChecksumMismatch",
			`${region} checksum mismatch: stored 0x${hex4(stored)}, computed 0x${hex4(computed)}`,
		);
		this.region = region;
		this.stored = stored;
		this.computed = computed;
	}
}

/** Text field value contains characters outside 7-bit ASCII */
export class EncodingError extends SpdError {
	readonly field: string;

	constructor(field: string, message: string) {
		super("EncodingError", message);
		this.field = field;
	}
}

/** The caller aborted a transfer; raised at the next chunk boundary */
export class TransferCancelledError extends SpdError {
	readonly bytesProcessed: number;

	constructor(bytesProcessed: number, options?: SpdErrorOptions) {
		super(
			"TransferCancelled",
			`Transfer cancelled after ${bytesProcessed} bytes`,
			options,
		);
		this.bytesProcessed = bytesProcessed;
	}
}

/** An operation was attempted on a closed device session */
export class SessionClosedError extends SpdError {
	constructor() {
		super("SessionClosed", "Device session is closed");
	}
}

/**
 * A value does not fit the field it is being encoded into.
 * Raised instead of silently clamping or truncating.
 */
export class FieldRangeError extends RangeError {
	readonly code = "RangeError";
	readonly field: string;
	readonly value: unknown;

	constructor(field: string, value: unknown, message: string) {
		super(message);
		this.name = "FieldRangeError";
		this.field = field;
		this.value = value;
	}
}

function hex2(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, "0");
}

function hex3(value: number): string {
	return value.toString(16).toUpperCase().padStart(3, "0");
}

function hex4(value: number): string {
	return value.toString(16).toUpperCase().padStart(4, "0");
}
