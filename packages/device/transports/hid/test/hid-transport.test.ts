import { DeviceBusyError, DeviceNotFoundError, SessionClosedError } from "@spdkit/core";
import type { Device } from "node-hid";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { HidTransport } from "../src/index.js";

const hid = vi.hoisted(() => {
	const handle = {
		write: vi.fn(async (_report: number[]) => 65),
		read: vi.fn(async (_timeout?: number): Promise<Buffer | undefined> => undefined),
		close: vi.fn(async () => {}),
	};
	return {
		handle,
		devicesAsync: vi.fn(async (): Promise<Device[]> => []),
		open: vi.fn(async (_path: string) => handle),
	};
});

vi.mock("node-hid", () => ({
	devicesAsync: hid.devicesAsync,
	HIDAsync: { open: hid.open },
}));

function device(overrides: Partial<Device> = {}): Device {
	return {
		vendorId: 0x0483,
		productId: 0x1230,
		path: "/dev/hidraw1",
		product: "SPD Programmer",
		release: 0x0100,
		interface: 0,
		...overrides,
	};
}

describe("HidTransport", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		hid.devicesAsync.mockResolvedValue([
			device(),
			device({ vendorId: 0x1234, path: "/dev/hidraw2" }),
			device({ path: "/dev/hidraw3", product: undefined }),
			device({ path: undefined }),
		]);
	});

	describe("listDevices", () => {
		it("keeps devices matching the default IDs that have a path", async () => {
			const devices = await new HidTransport().listDevices();
			expect(devices.map((d) => d.id)).toEqual(["hid:/dev/hidraw1", "hid:/dev/hidraw3"]);
			expect(devices[0]).toMatchObject({
				name: "SPD Programmer",
				transportName: "hid",
				connected: false,
			});
			expect(devices[1]?.name).toBe("SPD Programmer");
		});

		it("filters by configured IDs", async () => {
			const devices = await new HidTransport({ vendorId: 0x1234 }).listDevices();
			expect(devices.map((d) => d.id)).toEqual(["hid:/dev/hidraw2"]);
		});
	});

	describe("connect", () => {
		it("opens the first match when no id is given", async () => {
			const connection = await new HidTransport().connect();
			expect(hid.open).toHaveBeenCalledWith("/dev/hidraw1");
			expect(connection.deviceInfo.id).toBe("hid:/dev/hidraw1");
			expect(connection.deviceInfo.connected).toBe(true);
		});

		it("opens the device with the given id", async () => {
			await new HidTransport().connect("hid:/dev/hidraw3");
			expect(hid.open).toHaveBeenCalledWith("/dev/hidraw3");
		});

		it("throws DeviceNotFoundError for an unknown id", async () => {
			await expect(new HidTransport().connect("hid:/dev/hidraw9")).rejects.toThrow(
				"No SPD programmer found with VID 0x0483 / PID 0x1230",
			);
		});

		it("throws DeviceNotFoundError when nothing is attached", async () => {
			hid.devicesAsync.mockResolvedValue([]);
			await expect(new HidTransport().connect()).rejects.toThrow(DeviceNotFoundError);
			expect(hid.open).not.toHaveBeenCalled();
		});

		it("throws DeviceBusyError when the device cannot be opened", async () => {
			const cause = new Error("cannot open device");
			hid.open.mockRejectedValueOnce(cause);

			const error = await new HidTransport().connect().catch((e: unknown) => e);
			expect(error).toBeInstanceOf(DeviceBusyError);
			expect(error).toMatchObject({ code: "DeviceBusy", cause });
		});
	});

	describe("HidConnection.sendFrame", () => {
		it("sends report ID 0 and a zero-padded 64-byte payload", async () => {
			hid.handle.read.mockResolvedValueOnce(Buffer.from([0x3a, 0x20, 0x41]));
			const connection = await new HidTransport({ responseDelayMs: 0 }).connect();

			const reply = await connection.sendFrame(new TextEncoder().encode("BT"), 250);

			const report = hid.handle.write.mock.calls[0]?.[0];
			expect(report).toHaveLength(65);
			expect(report?.slice(0, 4)).toEqual([0x00, 0x42, 0x54, 0x00]);
			expect(report?.slice(3).every((b) => b === 0)).toBe(true);
			expect(hid.handle.read).toHaveBeenCalledWith(250);
			expect(reply).toEqual(new Uint8Array([0x3a, 0x20, 0x41]));
		});

		it("uses the configured read timeout by default", async () => {
			const connection = await new HidTransport({
				responseDelayMs: 0,
				readTimeoutMs: 400,
			}).connect();
			await connection.sendFrame(new Uint8Array([1]));
			expect(hid.handle.read).toHaveBeenCalledWith(400);
		});

		it("returns an empty frame when the read times out", async () => {
			const connection = await new HidTransport({ responseDelayMs: 0 }).connect();
			expect(await connection.sendFrame(new Uint8Array([1]))).toEqual(new Uint8Array(0));
		});

		it("rejects payloads longer than one report", async () => {
			const connection = await new HidTransport({ responseDelayMs: 0 }).connect();
			await expect(connection.sendFrame(new Uint8Array(65))).rejects.toThrow(
				"HID payload is 65 bytes; a report holds 64",
			);
			expect(hid.handle.write).not.toHaveBeenCalled();
		});

		it("refuses to send after close", async () => {
			const connection = await new HidTransport({ responseDelayMs: 0 }).connect();
			await connection.close();
			await connection.close();

			expect(hid.handle.close).toHaveBeenCalledTimes(1);
			await expect(connection.sendFrame(new Uint8Array([1]))).rejects.toThrow(
				SessionClosedError,
			);
		});
	});
});
