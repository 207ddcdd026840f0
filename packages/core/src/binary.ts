import { FieldRangeError } from "./errors";

/**
 * Endianness for multi-byte values
 * - "le" = little-endian (least significant byte first)
 * - "be" = big-endian (most significant byte first)
 */
export type Endianness = "le" | "be";

/**
 * Integer types stored in SPD images
 * - "u8" = unsigned 8-bit integer (0-255)
 * - "i8" = signed 8-bit integer (-128 to 127), used by fine timebase offsets
 * - "u16" = unsigned 16-bit integer (0-65535)
 * - "i16" = signed 16-bit integer (-32768 to 32767)
 * - "u32" = unsigned 32-bit integer (0-4294967295)
 */
export type ScalarType = "u8" | "i8" | "u16" | "i16" | "u32";

/**
 * Decode a scalar value from a buffer at the given offset
 *
 * @param buffer - The buffer to read from
 * @param offset - Byte offset in the buffer
 * @param type - The scalar type to decode
 * @param endian - Byte order for multi-byte values @default "le"
 * @throws Error if offset is out of bounds
 *
 * @example
 * const buffer = new Uint8Array([0x12, 0x34]);
 * const value = decodeScalar(buffer, 0, "u16", "be"); // 0x1234
 */
export function decodeScalar(
	buffer: Uint8Array,
	offset: number,
	type: ScalarType,
	endian: Endianness = "le",
): number {
	const size = sizeOf(type);
	if (offset < 0 || offset + size > buffer.length) {
		throw new Error(
			`Offset ${offset} out of bounds for ${type} in buffer of length ${buffer.length}`,
		);
	}

	const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
	const littleEndian = endian === "le";

	switch (type) {
		case "u8":
			return view.getUint8(offset);
		case "i8":
			return view.getInt8(offset);
		case "u16":
			return view.getUint16(offset, littleEndian);
		case "i16":
			return view.getInt16(offset, littleEndian);
		case "u32":
			return view.getUint32(offset, littleEndian);
		default: {
			const _exhaustive: never = type;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}
}

/**
 * Get the byte size of a scalar type
 *
 * @example
 * sizeOf("u16"); // 2
 */
export function sizeOf(dtype: ScalarType): 1 | 2 | 4 {
	switch (dtype) {
		case "u8":
		case "i8":
			return 1;
		case "u16":
		case "i16":
			return 2;
		case "u32":
			return 4;
	}
}

/**
 * Inclusive value range of a scalar type
 */
export function rangeOf(dtype: ScalarType): { min: number; max: number } {
	switch (dtype) {
		case "u8":
			return { min: 0, max: 0xff };
		case "i8":
			return { min: -0x80, max: 0x7f };
		case "u16":
			return { min: 0, max: 0xffff };
		case "i16":
			return { min: -0x8000, max: 0x7fff };
		case "u32":
			return { min: 0, max: 0xffffffff };
	}
}

/**
 * Encode an integer to a byte array
 *
 * Values are never clamped: anything that
 * is not an integer inside the type's range is rejected.
 *
 * @param value - The integer to encode
 * @param dtype - The scalar data type to encode to
 * @param endianness - Byte order
 * @param field - Field name reported in errors
 * @throws FieldRangeError if the value is not representable
 *
 * @example
 * const bytes = encodeScalar(0x1234, "u16", "be"); // Uint8Array([0x12, 0x34])
 */
export function encodeScalar(
	value: number,
	dtype: ScalarType,
	endianness: Endianness = "le",
	field: string = dtype,
): Uint8Array {
	const { min, max } = rangeOf(dtype);
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new FieldRangeError(
			field,
			value,
			`${field}: ${value} is outside the ${dtype} range ${min}..${max}`,
		);
	}

	const size = sizeOf(dtype);
	const buffer = new ArrayBuffer(size);
	const view = new DataView(buffer);
	const littleEndian = endianness === "le";

	switch (dtype) {
		case "u8":
			view.setUint8(0, value);
			break;
		case "i8":
			view.setInt8(0, value);
			break;
		case "u16":
			view.setUint16(0, value, littleEndian);
			break;
		case "i16":
			view.setInt16(0, value, littleEndian);
			break;
		case "u32":
			view.setUint32(0, value, littleEndian);
			break;
	}

	return new Uint8Array(buffer);
}
