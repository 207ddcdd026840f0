/**
 * Checksum algorithms used by SPD images
 *
 * DDR4 SPD blocks and XMP profiles are protected by CRC-16 with polynomial
 * 0x1021, initial value 0 and no reflection (CRC-16/XMODEM, as described by
 * JEDEC Annex L).
 */

/**
 * CRC-16 lookup table for polynomial 0x1021 (MSB-first)
 * Pre-computed for performance
 */
const CRC16_TABLE = (() => {
	const table = new Uint16Array(256);
	for (let i = 0; i < 256; i++) {
		let crc = i << 8;
		for (let j = 0; j < 8; j++) {
			crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
		}
		table[i] = crc;
	}
	return table;
})();

/**
 * Calculate the JEDEC SPD CRC-16 of data
 *
 * @returns CRC as unsigned 16-bit integer
 *
 * @example
 * ```typescript
 * const data = new TextEncoder().encode("123456789");
 * crc16(data).toString(16); // "31c3"
 * ```
 */
export function crc16(data: Uint8Array): number {
	let crc = 0;

	for (let i = 0; i < data.length; i++) {
		const byte = data[i] as number;
		const tableVal = CRC16_TABLE[((crc >>> 8) ^ byte) & 0xff] as number;
		crc = ((crc << 8) ^ tableVal) & 0xffff;
	}

	return crc;
}
