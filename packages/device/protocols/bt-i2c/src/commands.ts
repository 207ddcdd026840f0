/**
 * ASCII command set of BT-I2C programmers.
 *
 * Commands are sent as plain ASCII in the payload of one HID report.
 * Numeric arguments are two upper-case hex digits each. A read reply is
 * `:` followed by space-separated hex bytes.
 */

/** 7-bit I2C address of the SPD EEPROM on DIMM slot 0 */
export const SPD_I2C_ADDRESS = 0x50;

/** Bytes per read or write command */
export const CHUNK_SIZE = 8;

/** Wakes the bridge and reports its firmware version */
export const WAKE_COMMAND = "BT-VER0010";

/**
 * EE1004 set-page commands. They are writes to the page select addresses
 * 0x36 (page 0) and 0x37 (page 1).
 */
export const PAGE_SELECT_COMMANDS = ["BT-I2C2WR360001", "BT-I2C2WR370001"] as const;

/**
 * @example
 * readChunkCommand(0x50, 0x20); // => "BT-I2C2RD502008"
 */
export function readChunkCommand(
	address: number,
	offset: number,
	length = CHUNK_SIZE,
): string {
	return `BT-I2C2RD${hex(address)}${hex(offset)}${hex(length)}`;
}

/**
 * @example
 * writeChunkCommand(0x50, 0x08, new Uint8Array([0x12, 0xab]));
 * // => "BT-I2C2WR50080212AB"
 */
export function writeChunkCommand(address: number, offset: number, data: Uint8Array): string {
	const payload = Array.from(data, hex).join("");
	return `BT-I2C2WR${hex(address)}${hex(offset)}${hex(data.length)}${payload}`;
}

export function encodeCommand(command: string): Uint8Array {
	return new TextEncoder().encode(command);
}

/** Reply text: printable ASCII only, NUL padding and control bytes dropped */
export function decodeReply(frame: Uint8Array): string {
	let text = "";
	for (const byte of frame) {
		if (byte >= 0x20 && byte <= 0x7e) {
			text += String.fromCharCode(byte);
		}
	}
	return text;
}

/**
 * Parse a read reply. Tokens that are not exactly two hex digits are
 * skipped; extra bytes past `length` are ignored.
 *
 * @returns null unless the reply starts with `:` and holds `length` bytes
 *
 * @example
 * parseReadReply(": 23 11 0C 02 85 21 00 00", 8);
 * // => Uint8Array [0x23, 0x11, 0x0c, 0x02, 0x85, 0x21, 0x00, 0x00]
 */
export function parseReadReply(reply: string, length = CHUNK_SIZE): Uint8Array | null {
	if (!reply.startsWith(":")) {
		return null;
	}
	const tokens = reply
		.slice(1)
		.trim()
		.split(/\s+/)
		.filter((token) => /^[0-9a-fA-F]{2}$/.test(token))
		.slice(0, length);
	if (tokens.length !== length) {
		return null;
	}
	return Uint8Array.from(tokens, (token) => Number.parseInt(token, 16));
}

function hex(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, "0");
}
