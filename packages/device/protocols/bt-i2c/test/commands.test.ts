import { describe, expect, it } from "vitest";
import {
	decodeReply,
	encodeCommand,
	parseReadReply,
	readChunkCommand,
	writeChunkCommand,
} from "../src/commands.js";

describe("command builders", () => {
	it("formats read commands with hex address, offset and length", () => {
		expect(readChunkCommand(0x50, 0x00)).toBe("BT-I2C2RD500008");
		expect(readChunkCommand(0x50, 0xf8)).toBe("BT-I2C2RD50F808");
		expect(readChunkCommand(0x51, 0x20, 4)).toBe("BT-I2C2RD512004");
	});

	it("appends the payload to write commands", () => {
		const data = new Uint8Array([0x12, 0xab, 0x00, 0x0f, 0xff, 0x01, 0x10, 0x7e]);
		expect(writeChunkCommand(0x50, 0x08, data)).toBe("BT-I2C2WR50080812AB000FFF01107E");
	});

	it("encodes commands as plain ASCII", () => {
		expect(Array.from(encodeCommand("BT-VER0010"))).toEqual([
			0x42, 0x54, 0x2d, 0x56, 0x45, 0x52, 0x30, 0x30, 0x31, 0x30,
		]);
	});
});

describe("decodeReply", () => {
	it("drops padding and control bytes", () => {
		const frame = new Uint8Array(64);
		frame.set([0x4f, 0x4b, 0x0d, 0x0a]);
		expect(decodeReply(frame)).toBe("OK");
	});
});

describe("parseReadReply", () => {
	it("parses eight hex bytes", () => {
		expect(Array.from(parseReadReply(": 23 11 0C 02 85 21 00 00") ?? [])).toEqual([
			0x23, 0x11, 0x0c, 0x02, 0x85, 0x21, 0x00, 0x00,
		]);
	});

	it("accepts lower-case digits and ignores extra bytes", () => {
		expect(Array.from(parseReadReply(":ab cd", 1) ?? [])).toEqual([0xab]);
	});

	it("skips tokens that are not two hex digits", () => {
		expect(Array.from(parseReadReply(": 01 zz 02 003 03", 3) ?? [])).toEqual([1, 2, 3]);
	});

	it("rejects replies without the colon prefix", () => {
		expect(parseReadReply("23 11 0C 02 85 21 00 00")).toBeNull();
		expect(parseReadReply("ERR")).toBeNull();
	});

	it("rejects short replies", () => {
		expect(parseReadReply(": 23 11 0C")).toBeNull();
		expect(parseReadReply(":")).toBeNull();
	});
});
