/**
 * Checksum management for SPD images
 *
 * This module provides functions to:
 * - Recompute a checksum over its covered regions
 * - Read and write the stored value
 * - Validate stored against computed
 * - Detect whether an edit touched a checksum's covered bytes
 */

import { type Endianness, decodeScalar, encodeScalar } from "../binary";
import { crc16 } from "./algorithms";

export type ChecksumAlgorithm = "crc16";

/** Half-open byte range `[start, end)` covered by a checksum */
export interface ChecksumRegion {
	start: number;
	end: number;
}

export interface ChecksumDefinition {
	/** Human-readable name reported in issues and errors */
	name: string;
	algorithm: ChecksumAlgorithm;
	regions: ChecksumRegion[];
	storage: {
		offset: number;
		size: 2;
		endianness?: Endianness;
	};
}

export interface ChecksumValidation {
	valid: boolean;
	/** Value computed from the covered bytes */
	expected: number;
	/** Value stored in the image */
	actual: number;
	algorithm: ChecksumAlgorithm;
}

/**
 * Recompute a checksum from image data
 *
 * @throws Error if a region lies outside the image
 *
 * @example
 * ```typescript
 * const crc = recomputeChecksum(image, {
 *   name: "base",
 *   algorithm: "crc16",
 *   regions: [{ start: 0, end: 126 }],
 *   storage: { offset: 126, size: 2 },
 * });
 * ```
 */
export function recomputeChecksum(
	image: Uint8Array,
	checksumDef: ChecksumDefinition,
): number {
	for (const region of checksumDef.regions) {
		if (region.start < 0 || region.end > image.length) {
			throw new Error(
				`Invalid checksum region: start=${region.start}, end=${region.end}, image length=${image.length}`,
			);
		}
		if (region.start >= region.end) {
			throw new Error(
				`Invalid checksum region: start=${region.start} must be less than end=${region.end}`,
			);
		}
	}

	const data = collectRegionData(image, checksumDef.regions);

	switch (checksumDef.algorithm) {
		case "crc16":
			return crc16(data);
		default: {
			const _exhaustive: never = checksumDef.algorithm;
			throw new Error(`Unknown checksum algorithm: ${_exhaustive}`);
		}
	}
}

/**
 * Write a checksum value to its storage location (in place)
 *
 * @throws Error if the storage offset is out of bounds
 */
export function writeChecksum(
	image: Uint8Array,
	checksum: number,
	checksumDef: ChecksumDefinition,
): void {
	const { offset, endianness = "le" } = checksumDef.storage;
	assertStorage(image, checksumDef);
	image.set(
		encodeScalar(checksum & 0xffff, "u16", endianness, checksumDef.name),
		offset,
	);
}

/**
 * Read the stored checksum value
 *
 * @throws Error if the storage offset is out of bounds
 */
export function readChecksum(
	image: Uint8Array,
	checksumDef: ChecksumDefinition,
): number {
	const { offset, endianness = "le" } = checksumDef.storage;
	assertStorage(image, checksumDef);
	return decodeScalar(image, offset, "u16", endianness);
}

/**
 * Compare the stored checksum with one computed from the covered bytes
 *
 * @example
 * ```typescript
 * const result = validateChecksum(image, DDR4_BASE_CHECKSUM);
 * if (!result.valid) {
 *   console.log(`stored ${result.actual}, computed ${result.expected}`);
 * }
 * ```
 */
export function validateChecksum(
	image: Uint8Array,
	checksumDef: ChecksumDefinition,
): ChecksumValidation {
	const actual = readChecksum(image, checksumDef);
	const expected = recomputeChecksum(image, checksumDef);

	return {
		valid: actual === expected,
		expected,
		actual,
		algorithm: checksumDef.algorithm,
	};
}

/**
 * True when any byte covered by the checksum differs between two images
 */
export function coveredBytesChanged(
	before: Uint8Array,
	after: Uint8Array,
	checksumDef: ChecksumDefinition,
): boolean {
	for (const region of checksumDef.regions) {
		for (let i = region.start; i < region.end; i++) {
			if (before[i] !== after[i]) {
				return true;
			}
		}
	}
	return false;
}

/**
 * Recompute and store a checksum when its covered bytes changed, or always
 * when `force` is set. Returns whether the stored value was rewritten.
 */
export function refreshChecksum(
	before: Uint8Array,
	after: Uint8Array,
	checksumDef: ChecksumDefinition,
	force = false,
): boolean {
	if (!force && !coveredBytesChanged(before, after, checksumDef)) {
		return false;
	}
	writeChecksum(after, recomputeChecksum(after, checksumDef), checksumDef);
	return true;
}

function assertStorage(image: Uint8Array, checksumDef: ChecksumDefinition): void {
	const { offset, size } = checksumDef.storage;
	if (offset < 0 || offset + size > image.length) {
		throw new Error(
			`Invalid checksum storage offset: ${offset}, size: ${size}, image length: ${image.length}`,
		);
	}
}

/**
 * Collect data from all specified regions
 *
 * @internal
 */
function collectRegionData(
	image: Uint8Array,
	regions: ChecksumRegion[],
): Uint8Array {
	let totalSize = 0;
	for (const region of regions) {
		totalSize += region.end - region.start;
	}

	const data = new Uint8Array(totalSize);

	let offset = 0;
	for (const region of regions) {
		const regionData = image.subarray(region.start, region.end);
		data.set(regionData, offset);
		offset += regionData.length;
	}

	return data;
}
