import {
	type ChecksumDefinition,
	refreshChecksum,
	validateChecksum,
} from "../checksum/manager";
import { ChecksumMismatchError } from "../errors";
import { assertRawImage } from "../image";
import { DDR4_BASE_CHECKSUM, DDR4_MODULE_CHECKSUM } from "./ddr4-fields";
import { decodeXmp, xmpProfileChecksum } from "./xmp";

/**
 * CRCs an image carries: the base and module blocks, plus one per enabled
 * XMP profile.
 */
export function imageChecksums(image: Uint8Array): ChecksumDefinition[] {
	const checksums = [DDR4_BASE_CHECKSUM, DDR4_MODULE_CHECKSUM];
	const xmp = decodeXmp(image);
	if (xmp.present) {
		for (const profile of xmp.profiles) {
			if (profile) {
				checksums.push(xmpProfileChecksum(profile.index));
			}
		}
	}
	return checksums;
}

/**
 * Every stored CRC that does not match its covered bytes, in image order.
 *
 * @throws InvalidImageSizeError if the image is not 512 bytes
 */
export function findChecksumMismatches(image: Uint8Array): ChecksumMismatchError[] {
	assertRawImage(image);
	const mismatches: ChecksumMismatchError[] = [];
	for (const checksum of imageChecksums(image)) {
		const result = validateChecksum(image, checksum);
		if (!result.valid) {
			mismatches.push(new ChecksumMismatchError(checksum.name, result.actual, result.expected));
		}
	}
	return mismatches;
}

/**
 * Gate for anything that leaves the process (a module write).
 *
 * @throws ChecksumMismatchError for the first stale CRC
 *
 * @example
 * assertChecksumsValid(image); // throws "base checksum mismatch: stored 0x0000, computed 0x..."
 */
export function assertChecksumsValid(image: Uint8Array): void {
	const [first] = findChecksumMismatches(image);
	if (first) {
		throw first;
	}
}

/**
 * Recompute every CRC the image carries. `image` is not modified.
 *
 * @example
 * const fixed = recomputeAllChecksums(edited);
 * findChecksumMismatches(fixed); // => []
 */
export function recomputeAllChecksums(image: Uint8Array): Uint8Array {
	assertRawImage(image);
	const fixed = new Uint8Array(image);
	for (const checksum of imageChecksums(image)) {
		refreshChecksum(image, fixed, checksum, true);
	}
	return fixed;
}
