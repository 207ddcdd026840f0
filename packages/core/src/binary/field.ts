/**
 * Descriptor-driven field access over fixed-size buffers.
 *
 * A {@link FieldSpec} is static metadata (offset, width, encoding). The SPD
 * and XMP field tables are plain objects of these descriptors, and the
 * functions below interpret them; no per-field code paths exist.
 */

import { type Endianness, decodeScalar, encodeScalar } from "../binary";
import { EncodingError, FieldRangeError } from "../errors";
import { extractBits, insertBits } from "./bit-extract";

/** Unsigned integer, optionally narrowed to a bit range of the integer */
export interface UIntField {
	kind: "uint";
	offset: number;
	size: 1 | 2 | 4;
	endian?: Endianness;
	/** Lowest bit of a packed sub-field (LSB-first) */
	shift?: number;
	/** Width of a packed sub-field in bits */
	width?: number;
}

/** Signed two's complement integer */
export interface IntField {
	kind: "int";
	offset: number;
	size: 1 | 2;
	endian?: Endianness;
}

/** Fixed-length 7-bit ASCII text, padded on the right */
export interface TextField {
	kind: "text";
	offset: number;
	length: number;
	/** Pad character written after the value @default " " */
	pad?: string;
}

/** Fixed-length raw bytes */
export interface BytesField {
	kind: "bytes";
	offset: number;
	length: number;
}

export type FieldSpec = UIntField | IntField | TextField | BytesField;

/** Decoded value type for a given field descriptor */
export type FieldValue<F extends FieldSpec> = F extends TextField
	? string
	: F extends BytesField
		? Uint8Array
		: number;

/** Number of bytes a field occupies in the buffer */
export function fieldLength(spec: FieldSpec): number {
	switch (spec.kind) {
		case "uint":
		case "int":
			return spec.size;
		case "text":
		case "bytes":
			return spec.length;
	}
}

/**
 * Read a field from a buffer.
 *
 * Text fields drop non-printable bytes and trailing/leading padding.
 *
 * @example
 * readField(image, { kind: "uint", offset: 12, size: 1, shift: 3, width: 3 });
 */
export function readField<F extends FieldSpec>(
	buffer: Uint8Array,
	spec: F,
): FieldValue<F>;
export function readField(
	buffer: Uint8Array,
	spec: FieldSpec,
): string | Uint8Array | number {
	assertInBounds(buffer, spec);

	switch (spec.kind) {
		case "uint": {
			const raw = decodeScalar(buffer, spec.offset, uintType(spec.size), spec.endian);
			if (spec.width === undefined) {
				return raw;
			}
			return extractBits(raw, spec.shift ?? 0, spec.width);
		}
		case "int":
			return decodeScalar(
				buffer,
				spec.offset,
				spec.size === 1 ? "i8" : "i16",
				spec.endian,
			);
		case "text": {
			let text = "";
			for (const byte of buffer.subarray(spec.offset, spec.offset + spec.length)) {
				if (byte >= 0x20 && byte < 0x7f) {
					text += String.fromCharCode(byte);
				}
			}
			return text.trim();
		}
		case "bytes":
			return buffer.slice(spec.offset, spec.offset + spec.length);
	}
}

/**
 * Return a copy of `buffer` with one field replaced.
 * The input is left untouched and the result has the same length.
 *
 * @param name - Field name used in error messages
 * @throws FieldRangeError if the value does not fit the field
 * @throws EncodingError if text contains non-ASCII characters
 */
export function writeField<F extends FieldSpec>(
	buffer: Uint8Array,
	spec: F,
	value: FieldValue<F>,
	name = "field",
): Uint8Array {
	const copy = new Uint8Array(buffer);
	setField(copy, spec, value, name);
	return copy;
}

/**
 * Write a field into `buffer` in place. Encoders call this on their own
 * working copy of an image.
 *
 * @throws FieldRangeError if the value does not fit the field
 * @throws EncodingError if text contains non-ASCII characters
 */
export function setField<F extends FieldSpec>(
	buffer: Uint8Array,
	spec: F,
	value: FieldValue<F>,
	name?: string,
): void;
export function setField(
	buffer: Uint8Array,
	spec: FieldSpec,
	value: string | Uint8Array | number,
	name = "field",
): void {
	assertInBounds(buffer, spec);

	switch (spec.kind) {
		case "uint": {
			const num = expectNumber(value, name);
			const type = uintType(spec.size);
			let raw = num;
			if (spec.width !== undefined) {
				if (!Number.isInteger(num) || num < 0 || num >= 2 ** spec.width) {
					throw new FieldRangeError(
						name,
						num,
						`${name}: ${num} does not fit in ${spec.width} bits`,
					);
				}
				const current = decodeScalar(buffer, spec.offset, type, spec.endian);
				raw = insertBits(current, spec.shift ?? 0, spec.width, num);
			}
			buffer.set(encodeScalar(raw, type, spec.endian, name), spec.offset);
			return;
		}
		case "int": {
			const num = expectNumber(value, name);
			const type = spec.size === 1 ? "i8" : "i16";
			buffer.set(encodeScalar(num, type, spec.endian, name), spec.offset);
			return;
		}
		case "text": {
			if (typeof value !== "string") {
				throw new FieldRangeError(name, value, `${name}: expected text`);
			}
			buffer.set(encodeText(value, spec, name), spec.offset);
			return;
		}
		case "bytes": {
			if (!(value instanceof Uint8Array) || value.length !== spec.length) {
				throw new FieldRangeError(
					name,
					value,
					`${name}: expected exactly ${spec.length} bytes`,
				);
			}
			buffer.set(value, spec.offset);
			return;
		}
	}
}

/**
 * Encode text for a fixed-length field: validate 7-bit ASCII, then pad.
 */
export function encodeText(value: string, spec: TextField, name = "text"): Uint8Array {
	const pad = spec.pad ?? " ";
	const padCode = pad.charCodeAt(0);
	if (pad.length !== 1 || padCode > 0x7f) {
		throw new EncodingError(name, `${name}: pad must be a single ASCII character`);
	}

	const bytes = new Uint8Array(spec.length).fill(padCode);
	if (value.length > spec.length) {
		throw new FieldRangeError(
			name,
			value,
			`${name}: "${value}" is ${value.length} characters; the field holds ${spec.length}`,
		);
	}

	for (let i = 0; i < value.length; i++) {
		const code = value.charCodeAt(i);
		if (code > 0x7f) {
			throw new EncodingError(
				name,
				`${name}: character "${value[i]}" at position ${i} is not 7-bit ASCII`,
			);
		}
		bytes[i] = code;
	}

	return bytes;
}

function uintType(size: 1 | 2 | 4): "u8" | "u16" | "u32" {
	switch (size) {
		case 1:
			return "u8";
		case 2:
			return "u16";
		case 4:
			return "u32";
	}
}

function expectNumber(value: unknown, name: string): number {
	if (typeof value !== "number") {
		throw new FieldRangeError(name, value, `${name}: expected a number`);
	}
	return value;
}

function assertInBounds(buffer: Uint8Array, spec: FieldSpec): void {
	const end = spec.offset + fieldLength(spec);
	if (spec.offset < 0 || end > buffer.length) {
		throw new Error(
			`Field at offset ${spec.offset} (length ${fieldLength(spec)}) exceeds buffer length ${buffer.length}`,
		);
	}
}
