import { DeviceBusyError, SessionClosedError, assertRawImage } from "@spdkit/core";
import type { DeviceConnection, DeviceTransport, SpdProtocol } from "./index.js";
import { throwIfCancelled } from "./transfer.js";
import type {
	DeviceInfo,
	DeviceLogger,
	ReadOptions,
	SessionState,
	VerifyResult,
	WriteOptions,
} from "./types.js";

export interface SpdProgrammerOptions {
	logger?: DeviceLogger;
}

/**
 * Owns the single device session.
 *
 * State machine:
 * `disconnected -> connecting -> connected -> reading | writing -> connected -> disconnected`
 *
 * At most one session is open at a time; a second `connect()` fails with
 * DeviceBusyError instead of queueing.
 *
 * @example
 * ```typescript
 * const programmer = new SpdProgrammer(new HidTransport(), new BtI2cProtocol());
 * const session = await programmer.connect();
 * try {
 *   const image = await session.readImage({ onProgress });
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export class SpdProgrammer {
	private readonly transport: DeviceTransport;
	private readonly protocol: SpdProtocol;
	private readonly logger: DeviceLogger | undefined;
	private connecting = false;
	private session: SpdSession | null = null;

	constructor(
		transport: DeviceTransport,
		protocol: SpdProtocol,
		options: SpdProgrammerOptions = {},
	) {
		this.transport = transport;
		this.protocol = protocol;
		this.logger = options.logger;
	}

	get state(): SessionState {
		if (this.connecting) {
			return "connecting";
		}
		return this.session?.state ?? "disconnected";
	}

	listDevices(): Promise<DeviceInfo[]> {
		return this.transport.listDevices();
	}

	/**
	 * Open a session on a device (the first match when `deviceId` is omitted).
	 *
	 * @throws DeviceBusyError if a session is already open or opening
	 * @throws DeviceNotFoundError if no device matches
	 */
	async connect(deviceId?: string): Promise<SpdSession> {
		if (this.connecting || this.session) {
			throw new DeviceBusyError("A device session is already open");
		}

		this.connecting = true;
		let connection: DeviceConnection;
		try {
			connection = await this.transport.connect(deviceId);
		} finally {
			this.connecting = false;
		}

		this.logger?.info("Connected", {
			device: connection.deviceInfo.id,
			transport: this.transport.name,
			protocol: this.protocol.name,
		});

		const session = new SpdSession(connection, this.protocol, {
			logger: this.logger,
			onClose: () => {
				if (this.session === session) {
					this.session = null;
				}
			},
		});
		this.session = session;
		return session;
	}
}

interface SpdSessionOptions {
	logger?: DeviceLogger | undefined;
	onClose?: () => void;
}

/**
 * Explicit handle for one open device. Transfers are serialized by a busy
 * flag: a request made while another is in flight fails fast with
 * DeviceBusyError. A failed transfer leaves the session connected.
 */
export class SpdSession {
	private readonly connection: DeviceConnection;
	private readonly protocol: SpdProtocol;
	private readonly logger: DeviceLogger | undefined;
	private readonly onClose: (() => void) | undefined;
	private _state: SessionState = "connected";

	constructor(
		connection: DeviceConnection,
		protocol: SpdProtocol,
		options: SpdSessionOptions = {},
	) {
		this.connection = connection;
		this.protocol = protocol;
		this.logger = options.logger;
		this.onClose = options.onClose;
	}

	get state(): SessionState {
		return this._state;
	}

	get deviceInfo(): DeviceInfo {
		return this.connection.deviceInfo;
	}

	get isBusy(): boolean {
		return this._state === "reading" || this._state === "writing";
	}

	/**
	 * Read the module. The returned buffer belongs to the caller.
	 *
	 * @throws ReadFaultError, TransferCancelledError, DeviceBusyError, SessionClosedError
	 */
	async readImage(options: ReadOptions = {}): Promise<Uint8Array> {
		const image = await this.run("reading", options, (opts) =>
			this.protocol.readSpd(this.connection, opts),
		);
		return new Uint8Array(image);
	}

	/**
	 * Write an image and verify it page by page.
	 *
	 * @throws WriteVerificationFailedError, TransferCancelledError, DeviceBusyError, SessionClosedError
	 */
	async writeImage(image: Uint8Array, options: WriteOptions = {}): Promise<void> {
		assertRawImage(image);
		const snapshot = new Uint8Array(image);
		const { originalImage, ...rest } = options;
		const writeOptions: WriteOptions = originalImage
			? { ...rest, originalImage: new Uint8Array(originalImage) }
			: rest;
		await this.run("writing", writeOptions, (opts) =>
			this.protocol.writeSpd(this.connection, snapshot, opts),
		);
	}

	/** Read the module back and compare it with `image` */
	async verifyImage(image: Uint8Array, options: ReadOptions = {}): Promise<VerifyResult> {
		assertRawImage(image);
		const expected = new Uint8Array(image);
		return this.run("reading", options, (opts) =>
			this.protocol.verifySpd(this.connection, expected, opts),
		);
	}

	/**
	 * Close the connection. Closing twice is a no-op.
	 *
	 * @throws DeviceBusyError while a transfer is in flight
	 */
	async close(): Promise<void> {
		if (this._state === "disconnected") {
			return;
		}
		if (this.isBusy) {
			throw new DeviceBusyError("Cannot close the session while a transfer is in progress");
		}
		this._state = "disconnected";
		try {
			await this.connection.close();
		} finally {
			this.onClose?.();
			this.logger?.info("Disconnected", { device: this.connection.deviceInfo.id });
		}
	}

	private async run<T, O extends ReadOptions>(
		state: "reading" | "writing",
		options: O,
		transfer: (options: O) => Promise<T>,
	): Promise<T> {
		if (this._state === "disconnected") {
			throw new SessionClosedError();
		}
		if (this.isBusy) {
			throw new DeviceBusyError(`Device is busy ${this._state}`);
		}
		throwIfCancelled(options.signal, 0);

		this._state = state;
		try {
			return await transfer({ ...options, logger: options.logger ?? this.logger });
		} finally {
			this._state = "connected";
		}
	}
}
