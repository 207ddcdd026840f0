import { DeviceBusyError, DeviceNotFoundError, SessionClosedError } from "@spdkit/core";
import {
	type DeviceConnection,
	type DeviceInfo,
	type DeviceLogger,
	type DeviceTransport,
	delay,
} from "@spdkit/device";
import { type Device, HIDAsync, devicesAsync } from "node-hid";

// USB identifiers of the CH341-style SPD programmer
export const DEFAULT_VENDOR_ID = 0x0483;
export const DEFAULT_PRODUCT_ID = 0x1230;

/** Payload bytes per HID report (the report ID is sent in front) */
export const REPORT_SIZE = 64;

const REPORT_ID = 0x00;

export interface HidTransportOptions {
	vendorId?: number;
	productId?: number;
	/** Wait between sending a report and reading the reply @default 20 */
	responseDelayMs?: number;
	/** Read timeout when the caller passes none @default 1000 */
	readTimeoutMs?: number;
	logger?: DeviceLogger;
}

/**
 * Converts a node-hid device to a DeviceInfo object.
 */
function hidDeviceToInfo(device: Device & { path: string }): DeviceInfo {
	return {
		id: `hid:${device.path}`,
		name: device.product ?? "SPD Programmer",
		transportName: "hid",
		connected: false,
		serialNumber: device.serialNumber,
	};
}

function hasPath(device: Device): device is Device & { path: string } {
	return typeof device.path === "string" && device.path.length > 0;
}

/**
 * An open HID handle. Each frame is one 65-byte output report (report ID 0
 * followed by the zero-padded payload); the reply is one input report.
 */
export class HidConnection implements DeviceConnection {
	readonly deviceInfo: DeviceInfo;

	private readonly device: HIDAsync;
	private readonly responseDelayMs: number;
	private readonly readTimeoutMs: number;
	private closed = false;

	constructor(
		device: HIDAsync,
		deviceInfo: DeviceInfo,
		options: { responseDelayMs: number; readTimeoutMs: number },
	) {
		this.device = device;
		this.deviceInfo = deviceInfo;
		this.responseDelayMs = options.responseDelayMs;
		this.readTimeoutMs = options.readTimeoutMs;
	}

	/**
	 * Write one report, then read one reply.
	 *
	 * @param data      - Payload, at most 64 bytes
	 * @param timeoutMs - Read timeout; an expired read yields an empty frame
	 */
	async sendFrame(data: Uint8Array, timeoutMs?: number): Promise<Uint8Array> {
		if (this.closed) {
			throw new SessionClosedError();
		}
		if (data.length > REPORT_SIZE) {
			throw new RangeError(
				`HID payload is ${data.length} bytes; a report holds ${REPORT_SIZE}`,
			);
		}

		const report = new Array<number>(REPORT_SIZE + 1).fill(0);
		report[0] = REPORT_ID;
		data.forEach((byte, i) => {
			report[i + 1] = byte;
		});

		await this.device.write(report);
		await delay(this.responseDelayMs);
		const response = await this.device.read(timeoutMs ?? this.readTimeoutMs);
		return response ? new Uint8Array(response) : new Uint8Array(0);
	}

	/** Release the device handle. Closing twice is a no-op. */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		await this.device.close();
	}
}

/**
 * DeviceTransport implementation for HID SPD programmers.
 * Enumerates with node-hid and filters by vendor and product ID.
 */
export class HidTransport implements DeviceTransport {
	readonly name = "USB HID";

	readonly vendorId: number;
	readonly productId: number;
	private readonly responseDelayMs: number;
	private readonly readTimeoutMs: number;
	private readonly logger: DeviceLogger | undefined;

	constructor(options: HidTransportOptions = {}) {
		this.vendorId = options.vendorId ?? DEFAULT_VENDOR_ID;
		this.productId = options.productId ?? DEFAULT_PRODUCT_ID;
		this.responseDelayMs = options.responseDelayMs ?? 20;
		this.readTimeoutMs = options.readTimeoutMs ?? 1000;
		this.logger = options.logger;
	}

	/** Return every attached programmer matching the configured IDs */
	async listDevices(): Promise<DeviceInfo[]> {
		const devices = await this.matchingDevices();
		return devices.map(hidDeviceToInfo);
	}

	/**
	 * Open the device identified by deviceId, or the first match.
	 *
	 * @param deviceId - The id field from DeviceInfo (format: "hid:<path>")
	 * @throws DeviceNotFoundError if no attached device matches
	 * @throws DeviceBusyError if the OS refuses to open it
	 */
	async connect(deviceId?: string): Promise<HidConnection> {
		const devices = await this.matchingDevices();
		const device =
			deviceId === undefined
				? devices[0]
				: devices.find((d) => hidDeviceToInfo(d).id === deviceId);

		if (device == null) {
			throw new DeviceNotFoundError(this.vendorId, this.productId);
		}

		let handle: HIDAsync;
		try {
			handle = await HIDAsync.open(device.path);
		} catch (error) {
			throw new DeviceBusyError(
				`Cannot open ${device.path}; another program may be using the programmer`,
				{ cause: error },
			);
		}

		this.logger?.debug("Opened HID device", { path: device.path });
		return new HidConnection(
			handle,
			{ ...hidDeviceToInfo(device), connected: true },
			{ responseDelayMs: this.responseDelayMs, readTimeoutMs: this.readTimeoutMs },
		);
	}

	private async matchingDevices(): Promise<(Device & { path: string })[]> {
		const devices = await devicesAsync();
		return devices
			.filter((d) => d.vendorId === this.vendorId && d.productId === this.productId)
			.filter(hasPath);
	}
}
