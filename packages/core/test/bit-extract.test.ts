import { describe, expect, it } from "vitest";
import {
	extractBitFlag,
	extractBits,
	insertBits,
} from "../src/binary/bit-extract";

describe("extractBits", () => {
	it("reads packed SPD organization fields LSB-first", () => {
		// byte 12 = 0x09: ranks code 1 in bits 5:3, width code 1 in bits 2:0
		expect(extractBits(0x09, 3, 3)).toBe(1);
		expect(extractBits(0x09, 0, 3)).toBe(1);
	});

	it("reads the bank group code from the top of byte 4", () => {
		expect(extractBits(0x85, 6, 2)).toBe(2);
		expect(extractBits(0x85, 0, 4)).toBe(5);
	});

	it("returns the full value for a 32-bit field", () => {
		expect(extractBits(0x80000000, 0, 32)).toBe(0x80000000);
	});

	it("reads a field in the upper half of a 32-bit value", () => {
		expect(extractBits(0xabcd0000, 16, 16)).toBe(0xabcd);
	});

	it("rejects ranges that do not fit in 32 bits", () => {
		expect(() => extractBits(0, 30, 4)).toThrow(
			"Bit range [30, 33] does not fit in 32 bits",
		);
		expect(() => extractBits(0, 0, 0)).toThrow("width must be positive, got 0");
	});
});

describe("extractBitFlag", () => {
	it("reads single bits", () => {
		expect(extractBitFlag(0x80, 7)).toBe(true);
		expect(extractBitFlag(0x80, 6)).toBe(false);
	});
});

describe("insertBits", () => {
	it("replaces a nibble and keeps the other bits", () => {
		expect(insertBits(0xf0, 0, 4, 0x5)).toBe(0xf5);
		expect(insertBits(0x11, 4, 4, 0x2)).toBe(0x21);
	});

	it("sets the high-range flag of a CAS mask", () => {
		expect(insertBits(0x0ff8, 31, 1, 1)).toBe(0x80000ff8);
	});

	it("rejects values wider than the field", () => {
		expect(() => insertBits(0, 0, 3, 8)).toThrow("Value 8 does not fit in a 3-bit field");
		expect(() => insertBits(0, 0, 3, -1)).toThrow();
	});
});
