/**
 * JEP106 manufacturer identification
 *
 * SPD stores a manufacturer as two bytes: the number of continuation codes
 * (bits 6:0 of the first byte, odd parity in bit 7) and the code itself
 * (including its parity bit). Bank 1 has no continuation codes.
 */

import jep106 from "../../data/jep106.json";

export interface ManufacturerId {
	/** JEP106 bank, starting at 1 */
	bank: number;
	/** Identification code byte, parity bit included */
	code: number;
	/** Resolved name, or `Unknown (bank N, 0xCC)` */
	name: string;
}

/**
 * Resolves JEP106 identifiers to names. Injected into the decoder so that
 * callers can supply a fuller table.
 */
export interface ManufacturerLookup {
	resolveName(bank: number, code: number): string | undefined;
	/** Reverse lookup, used when editing by name */
	resolveId?(name: string): { bank: number; code: number } | undefined;
}

interface Jep106Entry {
	bank: number;
	code: string;
	name: string;
}

/** Lookup over an in-memory table */
export class TableManufacturerLookup implements ManufacturerLookup {
	private readonly byId = new Map<string, string>();
	private readonly byName = new Map<string, { bank: number; code: number }>();

	constructor(entries: readonly { bank: number; code: number; name: string }[]) {
		for (const entry of entries) {
			this.byId.set(key(entry.bank, entry.code), entry.name);
			this.byName.set(entry.name.toLowerCase(), {
				bank: entry.bank,
				code: entry.code,
			});
		}
	}

	resolveName(bank: number, code: number): string | undefined {
		return this.byId.get(key(bank, code));
	}

	resolveId(name: string): { bank: number; code: number } | undefined {
		return this.byName.get(name.trim().toLowerCase());
	}
}

/** Lookup over the bundled JEP106 excerpt */
export const defaultManufacturerLookup: ManufacturerLookup =
	new TableManufacturerLookup(parseEntries(jep106));

/** Decode the two SPD bytes of a manufacturer ID */
export function decodeManufacturer(
	bankByte: number,
	code: number,
	lookup: ManufacturerLookup = defaultManufacturerLookup,
): ManufacturerId {
	const bank = (bankByte & 0x7f) + 1;
	return {
		bank,
		code,
		name: lookup.resolveName(bank, code) ?? unknownName(bank, code),
	};
}

/**
 * First SPD byte for a bank: continuation count with odd parity in bit 7.
 *
 * @example
 * encodeBankByte(1); // => 0x80
 * encodeBankByte(2); // => 0x01
 */
export function encodeBankByte(bank: number): number {
	const count = bank - 1;
	return hasOddParity(count) ? count : count | 0x80;
}

/** Whether a byte already carries an odd number of set bits */
export function hasOddParity(value: number): boolean {
	let bits = 0;
	for (let v = value & 0xff; v !== 0; v >>>= 1) {
		bits += v & 1;
	}
	return bits % 2 === 1;
}

function unknownName(bank: number, code: number): string {
	return `Unknown (bank ${bank}, 0x${code.toString(16).toUpperCase().padStart(2, "0")})`;
}

function key(bank: number, code: number): string {
	return `${bank}:${code}`;
}

function parseEntries(
	entries: readonly Jep106Entry[],
): { bank: number; code: number; name: string }[] {
	return entries.map((entry) => {
		const code = Number.parseInt(entry.code, 16);
		if (Number.isNaN(code) || code < 0 || code > 0xff) {
			throw new Error(`Invalid JEP106 code "${entry.code}" for ${entry.name}`);
		}
		return { bank: entry.bank, code, name: entry.name };
	});
}
