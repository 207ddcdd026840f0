/**
 * Bit-level helpers for packed SPD bytes.
 *
 * JEDEC describes packed fields as "bits 5~3" of a byte, so bit numbering
 * here is LSB-first: bit 0 is the least significant bit of the value and a
 * field is addressed by its lowest bit (`shift`) and its `width`.
 *
 * @module binary/bit-extract
 */

/**
 * Extract an unsigned bit field from an integer.
 *
 * @param value - Source integer (up to 32 bits)
 * @param shift - Position of the field's least significant bit
 * @param width - Number of bits in the field (1-32)
 * @throws Error if the field does not fit in 32 bits
 *
 * @example
 * // SPD byte 12 = 0x09: package ranks code in bits 5~3, SDRAM width in bits 2~0
 * extractBits(0x09, 3, 3); // => 1 (two package ranks)
 * extractBits(0x09, 0, 3); // => 1 (x8)
 */
export function extractBits(value: number, shift: number, width: number): number {
	assertBitRange(shift, width);
	if (width === 32) {
		return value >>> 0;
	}
	return ((value >>> shift) & mask(width)) >>> 0;
}

/**
 * Extract a single flag bit from an integer.
 *
 * @example
 * extractBitFlag(0x80, 7); // => true
 */
export function extractBitFlag(value: number, bit: number): boolean {
	return extractBits(value, bit, 1) === 1;
}

/**
 * Return `target` with the bit field at `shift`/`width` replaced by `field`.
 * Bits outside the field are preserved.
 *
 * @throws Error if `field` does not fit in `width` bits
 *
 * @example
 * insertBits(0xf0, 0, 4, 0x5); // => 0xf5
 */
export function insertBits(
	target: number,
	shift: number,
	width: number,
	field: number,
): number {
	assertBitRange(shift, width);
	const fieldMask = mask(width);
	if (!Number.isInteger(field) || field < 0 || field > fieldMask) {
		throw new Error(`Value ${field} does not fit in a ${width}-bit field`);
	}
	if (width === 32) {
		return field >>> 0;
	}
	const cleared = target & ~(fieldMask << shift);
	return (cleared | (field << shift)) >>> 0;
}

function mask(width: number): number {
	return 2 ** width - 1;
}

function assertBitRange(shift: number, width: number): void {
	if (width <= 0) {
		throw new Error(`width must be positive, got ${width}`);
	}
	if (shift < 0 || shift + width > 32) {
		throw new Error(
			`Bit range [${shift}, ${shift + width - 1}] does not fit in 32 bits`,
		);
	}
}
