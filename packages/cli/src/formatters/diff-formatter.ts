import type { ByteDifference } from "@spdkit/core";

/**
 * One line per differing byte.
 *
 * @example
 * formatDifferences([{ offset: 0x18, before: 0x6e, after: 0x6c }]);
 * // => "0x018: 0x6E -> 0x6C"
 */
export function formatDifferences(differences: readonly ByteDifference[]): string {
	return differences
		.map((d) => `0x${hex(d.offset, 3)}: 0x${hex(d.before, 2)} -> 0x${hex(d.after, 2)}`)
		.join("\n");
}

/** Difference lines followed by a count, or a single line when identical */
export function formatDiffReport(differences: readonly ByteDifference[]): string {
	if (differences.length === 0) {
		return "Images are identical";
	}
	const count =
		differences.length === 1 ? "1 byte differs" : `${differences.length} bytes differ`;
	return `${formatDifferences(differences)}\n${count}`;
}

function hex(value: number, digits: number): string {
	return value.toString(16).toUpperCase().padStart(digits, "0");
}
