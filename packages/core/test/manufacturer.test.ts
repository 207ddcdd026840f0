import { describe, expect, it } from "vitest";
import {
	TableManufacturerLookup,
	decodeManufacturer,
	defaultManufacturerLookup,
	encodeBankByte,
	hasOddParity,
} from "../src/spd/manufacturer";

describe("decodeManufacturer", () => {
	it("resolves bank 1 codes", () => {
		expect(decodeManufacturer(0x80, 0xce)).toEqual({ bank: 1, code: 0xce, name: "Samsung" });
	});

	it("ignores the parity bit when counting continuation codes", () => {
		expect(decodeManufacturer(0x01, 0x98).name).toBe("Kingston");
		expect(decodeManufacturer(0x02, 0x9e).name).toBe("Corsair");
		expect(decodeManufacturer(0x84, 0xcd).name).toBe("G.Skill");
	});

	it("names unknown identifiers by bank and code", () => {
		expect(decodeManufacturer(0x05, 0x12).name).toBe("Unknown (bank 6, 0x12)");
	});

	it("uses an injected lookup", () => {
		const lookup = new TableManufacturerLookup([{ bank: 1, code: 0x01, name: "Test Vendor" }]);
		expect(decodeManufacturer(0x80, 0x01, lookup).name).toBe("Test Vendor");
		expect(decodeManufacturer(0x80, 0xce, lookup).name).toBe("Unknown (bank 1, 0xCE)");
	});
});

describe("TableManufacturerLookup.resolveId", () => {
	it("matches names case-insensitively", () => {
		expect(defaultManufacturerLookup.resolveId?.(" sk hynix ")).toEqual({ bank: 1, code: 0xad });
		expect(defaultManufacturerLookup.resolveId?.("Nobody")).toBeUndefined();
	});
});

describe("encodeBankByte", () => {
	it("sets bit 7 to make the parity odd", () => {
		expect(encodeBankByte(1)).toBe(0x80);
		expect(encodeBankByte(2)).toBe(0x01);
		expect(encodeBankByte(3)).toBe(0x02);
		expect(encodeBankByte(4)).toBe(0x83);
	});

	it("produces bytes that decode back to the same bank", () => {
		for (let bank = 1; bank <= 8; bank++) {
			const byte = encodeBankByte(bank);
			expect(hasOddParity(byte)).toBe(true);
			expect(decodeManufacturer(byte, 0).bank).toBe(bank);
		}
	});
});
