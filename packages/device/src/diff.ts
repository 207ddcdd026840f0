import { InvalidImageSizeError, PAGE_SIZE } from "@spdkit/core";

/**
 * Identifies which EEPROM pages differ between two SPD images.
 *
 * Pages are compared with an early exit on the first differing byte.
 *
 * @param original - Image read from the module (before modification)
 * @param modified - Image to be written
 * @param pageSize - Page size in bytes
 * @returns Zero-based indices of pages that contain at least one changed byte
 * @throws InvalidImageSizeError if the images differ in length
 * @throws RangeError if the length is not a multiple of `pageSize`
 *
 * @example
 * // Part number edit: only the upper page changes
 * computeChangedPages(backup, edited); // => [1]
 */
export function computeChangedPages(
	original: Uint8Array,
	modified: Uint8Array,
	pageSize = PAGE_SIZE,
): number[] {
	if (original.length !== modified.length) {
		throw new InvalidImageSizeError(modified.length, original.length);
	}

	if (modified.length % pageSize !== 0) {
		throw new RangeError(
			`Image size ${modified.length} is not a multiple of page size ${pageSize}`,
		);
	}

	const changedPages: number[] = [];
	const numPages = modified.length / pageSize;

	for (let page = 0; page < numPages; page++) {
		const start = page * pageSize;
		const end = start + pageSize;

		for (let i = start; i < end; i++) {
			if (original[i] !== modified[i]) {
				changedPages.push(page);
				break;
			}
		}
	}

	return changedPages;
}
