import { InvalidImageSizeError } from "./errors";

/** Size of a DDR4 SPD EEPROM image in bytes */
export const SPD_SIZE = 512;

/** Size of one EE1004 page; the device exposes two */
export const PAGE_SIZE = 256;

export const PAGE_COUNT = SPD_SIZE / PAGE_SIZE;

/**
 * Throw unless `image` is exactly one SPD image long.
 *
 * @throws InvalidImageSizeError
 */
export function assertRawImage(image: Uint8Array): void {
	if (image.length !== SPD_SIZE) {
		throw new InvalidImageSizeError(image.length, SPD_SIZE);
	}
}

/** A single byte that differs between two images */
export interface ByteDifference {
	offset: number;
	before: number;
	after: number;
}

/**
 * List every offset at which two images of equal length differ, in
 * ascending order.
 *
 * @throws InvalidImageSizeError if the lengths differ
 *
 * @example
 * diffImages(a, b); // [{ offset: 0x140, before: 0x80, after: 0x01 }]
 */
export function diffImages(before: Uint8Array, after: Uint8Array): ByteDifference[] {
	if (before.length !== after.length) {
		throw new InvalidImageSizeError(after.length, before.length);
	}

	const differences: ByteDifference[] = [];
	for (let offset = 0; offset < before.length; offset++) {
		const a = before[offset] as number;
		const b = after[offset] as number;
		if (a !== b) {
			differences.push({ offset, before: a, after: b });
		}
	}
	return differences;
}
