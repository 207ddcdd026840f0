import {
	DeviceBusyError,
	DeviceNotFoundError,
	ReadFaultError,
	SessionClosedError,
	TransferCancelledError,
} from "@spdkit/core";
import { describe, expect, it, vi } from "vitest";
import type { DeviceConnection, DeviceTransport, SpdProtocol } from "../src/index.js";
import { SpdProgrammer } from "../src/session.js";
import type { DeviceInfo, ReadOptions, WriteOptions } from "../src/types.js";

const DEVICE: DeviceInfo = {
	id: "hid:test",
	name: "Test Programmer",
	transportName: "hid",
	connected: true,
};

function makeConnection(): DeviceConnection {
	return {
		deviceInfo: DEVICE,
		sendFrame: vi.fn(async () => new Uint8Array(0)),
		close: vi.fn(async () => {}),
	};
}

function makeTransport(connection: DeviceConnection = makeConnection()): DeviceTransport {
	return {
		name: "Test",
		listDevices: vi.fn(async () => [DEVICE]),
		connect: vi.fn(async () => connection),
	};
}

/** Protocol whose reads resolve only when the test says so */
function makeGatedProtocol() {
	let release: (image: Uint8Array) => void = () => {};
	const readOptions: ReadOptions[] = [];
	const writes: { image: Uint8Array; options: WriteOptions }[] = [];

	const protocol: SpdProtocol = {
		name: "Gated",
		readSpd: vi.fn((_connection: DeviceConnection, options: ReadOptions = {}) => {
			readOptions.push(options);
			return new Promise<Uint8Array>((resolve) => {
				release = resolve;
			});
		}),
		writeSpd: vi.fn(
			async (_connection: DeviceConnection, image: Uint8Array, options: WriteOptions = {}) => {
				writes.push({ image, options });
			},
		),
		verifySpd: vi.fn(async () => ({ matches: true, differences: [] })),
	};

	return { protocol, release: (image: Uint8Array) => release(image), readOptions, writes };
}

describe("SpdProgrammer", () => {
	it("walks through the session states", async () => {
		const gated = makeGatedProtocol();
		const programmer = new SpdProgrammer(makeTransport(), gated.protocol);
		expect(programmer.state).toBe("disconnected");

		const session = await programmer.connect();
		expect(programmer.state).toBe("connected");

		const pending = session.readImage();
		expect(programmer.state).toBe("reading");
		gated.release(new Uint8Array(512));
		await pending;
		expect(programmer.state).toBe("connected");

		await session.close();
		expect(programmer.state).toBe("disconnected");
	});

	it("reports connecting while the transport opens the device", async () => {
		let open: (connection: DeviceConnection) => void = () => {};
		const transport: DeviceTransport = {
			name: "Slow",
			listDevices: async () => [],
			connect: () =>
				new Promise<DeviceConnection>((resolve) => {
					open = resolve;
				}),
		};
		const programmer = new SpdProgrammer(transport, makeGatedProtocol().protocol);

		const pending = programmer.connect("hid:test");
		expect(programmer.state).toBe("connecting");
		await expect(programmer.connect()).rejects.toThrow(DeviceBusyError);

		open(makeConnection());
		await pending;
		expect(programmer.state).toBe("connected");
	});

	it("allows one session at a time", async () => {
		const programmer = new SpdProgrammer(makeTransport(), makeGatedProtocol().protocol);
		const session = await programmer.connect();

		await expect(programmer.connect()).rejects.toThrow("A device session is already open");

		await session.close();
		await expect(programmer.connect()).resolves.toBeDefined();
	});

	it("returns to disconnected when the transport finds nothing", async () => {
		const transport: DeviceTransport = {
			name: "Empty",
			listDevices: async () => [],
			connect: async () => {
				throw new DeviceNotFoundError(0x0483, 0x1230);
			},
		};
		const programmer = new SpdProgrammer(transport, makeGatedProtocol().protocol);

		await expect(programmer.connect()).rejects.toThrow(DeviceNotFoundError);
		expect(programmer.state).toBe("disconnected");
	});

	it("passes the device id through to the transport", async () => {
		const transport = makeTransport();
		const programmer = new SpdProgrammer(transport, makeGatedProtocol().protocol);
		await programmer.connect("hid:/dev/hidraw3");
		expect(transport.connect).toHaveBeenCalledWith("hid:/dev/hidraw3");
	});
});

describe("SpdSession", () => {
	it("rejects a second transfer while one is in flight", async () => {
		const gated = makeGatedProtocol();
		const session = await new SpdProgrammer(makeTransport(), gated.protocol).connect();

		const first = session.readImage();
		await expect(session.readImage()).rejects.toThrow(DeviceBusyError);
		await expect(session.writeImage(new Uint8Array(512))).rejects.toThrow(DeviceBusyError);
		await expect(session.close()).rejects.toThrow(DeviceBusyError);

		gated.release(new Uint8Array(512));
		await first;
		expect(session.isBusy).toBe(false);
	});

	it("returns a copy the session keeps no reference to", async () => {
		const gated = makeGatedProtocol();
		const session = await new SpdProgrammer(makeTransport(), gated.protocol).connect();
		const source = new Uint8Array(512).fill(0x11);

		const pending = session.readImage();
		gated.release(source);
		const image = await pending;

		expect(image).toEqual(source);
		expect(image).not.toBe(source);
	});

	it("snapshots the image and the original before writing", async () => {
		const gated = makeGatedProtocol();
		const session = await new SpdProgrammer(makeTransport(), gated.protocol).connect();
		const image = new Uint8Array(512).fill(0x22);
		const original = new Uint8Array(512);

		await session.writeImage(image, { originalImage: original });

		const [write] = gated.writes;
		expect(write?.image).toEqual(image);
		expect(write?.image).not.toBe(image);
		expect(write?.options.originalImage).toEqual(original);
		expect(write?.options.originalImage).not.toBe(original);
	});

	it("stays connected after a failed transfer", async () => {
		const protocol: SpdProtocol = {
			name: "Failing",
			readSpd: async () => {
				throw new ReadFaultError("Page 0 read back as all zeros", { page: 0, attempts: 3 });
			},
			writeSpd: async () => {},
			verifySpd: async () => ({ matches: true, differences: [] }),
		};
		const session = await new SpdProgrammer(makeTransport(), protocol).connect();

		await expect(session.readImage()).rejects.toThrow(ReadFaultError);
		expect(session.state).toBe("connected");
	});

	it("refuses to start with an aborted signal", async () => {
		const gated = makeGatedProtocol();
		const session = await new SpdProgrammer(makeTransport(), gated.protocol).connect();
		const controller = new AbortController();
		controller.abort();

		await expect(session.readImage({ signal: controller.signal })).rejects.toThrow(
			TransferCancelledError,
		);
		expect(gated.protocol.readSpd).not.toHaveBeenCalled();
	});

	it("hands its logger to the protocol", async () => {
		const gated = makeGatedProtocol();
		const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
		const session = await new SpdProgrammer(makeTransport(), gated.protocol, {
			logger,
		}).connect();

		const pending = session.readImage();
		gated.release(new Uint8Array(512));
		await pending;

		expect(gated.readOptions[0]?.logger).toBe(logger);
		expect(logger.info).toHaveBeenCalledWith("Connected", {
			device: "hid:test",
			transport: "Test",
			protocol: "Gated",
		});
	});

	it("rejects invalid images before touching the device", async () => {
		const gated = makeGatedProtocol();
		const session = await new SpdProgrammer(makeTransport(), gated.protocol).connect();

		await expect(session.writeImage(new Uint8Array(511))).rejects.toThrow(
			"SPD image must be exactly 512 bytes, got 511",
		);
		expect(gated.protocol.writeSpd).not.toHaveBeenCalled();
	});

	it("fails every call after close", async () => {
		const connection = makeConnection();
		const session = await new SpdProgrammer(
			makeTransport(connection),
			makeGatedProtocol().protocol,
		).connect();

		await session.close();
		await session.close();

		expect(connection.close).toHaveBeenCalledTimes(1);
		await expect(session.readImage()).rejects.toThrow(SessionClosedError);
		await expect(session.verifyImage(new Uint8Array(512))).rejects.toThrow(SessionClosedError);
	});
});
