import type {
	DeviceInfo,
	ReadOptions,
	VerifyResult,
	WriteOptions,
} from "./types.js";

/**
 * Abstracts a physical USB interface to an SPD programmer.
 *
 * Implementations:
 * - HidTransport: CH341-style programmers over USB HID via node-hid
 */
export interface DeviceTransport {
	/** Human-readable name, e.g. "USB HID" */
	readonly name: string;

	/** Enumerate connected programmers of this type */
	listDevices(): Promise<DeviceInfo[]>;

	/**
	 * Open a connection to a specific device by ID, or to the first
	 * matching device when no ID is given.
	 *
	 * @throws DeviceNotFoundError if no device matches
	 * @throws DeviceBusyError if the device cannot be opened
	 */
	connect(deviceId?: string): Promise<DeviceConnection>;
}

/**
 * An open, active connection to a programmer.
 * Exposes raw frame-level send/receive for use by SpdProtocol implementations.
 */
export interface DeviceConnection {
	readonly deviceInfo: DeviceInfo;

	/**
	 * Send a command frame and wait for one response frame.
	 * The frame format is transport-specific (one HID report for HidTransport).
	 */
	sendFrame(data: Uint8Array, timeoutMs?: number): Promise<Uint8Array>;

	close(): Promise<void>;
}

/**
 * Abstracts the command set a programmer speaks to reach the SPD EEPROM.
 *
 * Implementations:
 * - BtI2cProtocol: ASCII `BT-` commands, I2C bridge with EE1004 page select
 */
export interface SpdProtocol {
	/** Human-readable name, e.g. "BT-I2C (EE1004)" */
	readonly name: string;

	/**
	 * Read the full 512-byte image, page 0 then page 1.
	 * Reports progress after every chunk.
	 */
	readSpd(connection: DeviceConnection, options?: ReadOptions): Promise<Uint8Array>;

	/**
	 * Write a 512-byte image and verify every written page by reading it
	 * back. HIGH RISK: a module left half-written may not POST.
	 * Writes are never retried.
	 *
	 * @throws WriteVerificationFailedError with the first mismatching offset
	 */
	writeSpd(
		connection: DeviceConnection,
		image: Uint8Array,
		options?: WriteOptions,
	): Promise<void>;

	/** Read the module back and compare it with `image` */
	verifySpd(
		connection: DeviceConnection,
		image: Uint8Array,
		options?: ReadOptions,
	): Promise<VerifyResult>;
}

export * from "./diff.js";
export * from "./session.js";
export * from "./transfer.js";
export * from "./types.js";
