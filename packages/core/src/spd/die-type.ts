import dieTypes from "../../data/die-types.json";

export interface DieInfo {
	dieType: string;
	process: string;
	manufacturer: string;
}

const HYNIX_REVISIONS: Readonly<Record<string, DieInfo>> = dieTypes.hynixRevisions;
const PREFIXES: Readonly<Record<string, DieInfo>> = dieTypes.prefixes;

/**
 * Infer the DRAM die revision from a module part number.
 *
 * SK Hynix DDR4 part numbers (`HMA...R7<rev>...`) carry the die revision
 * right after the `R7` marker. Other vendors fall back to a prefix table,
 * longest prefix first.
 *
 * @param manufacturer - When given, a prefix match must name the same vendor
 * @returns undefined when nothing matches
 *
 * @example
 * inferDieType("HMA82GR7AFR8N-VK"); // => { dieType: "A-die", process: "21nm", ... }
 */
export function inferDieType(
	partNumber: string,
	manufacturer?: string,
): DieInfo | undefined {
	const part = partNumber.trim().toUpperCase();
	if (part.length === 0) {
		return undefined;
	}

	if (part.startsWith("HMA")) {
		const marker = part.indexOf("R7");
		const revision = marker === -1 ? undefined : part[marker + 2];
		const info = revision === undefined ? undefined : HYNIX_REVISIONS[revision];
		if (info) {
			return { ...info };
		}
	}

	for (let length = Math.min(part.length, 6); length >= 3; length--) {
		const match = PREFIXES[part.slice(0, length)];
		if (!match) {
			continue;
		}
		if (manufacturer && !sameVendor(match.manufacturer, manufacturer)) {
			continue;
		}
		return { ...match };
	}

	return undefined;
}

/**
 * Human-readable die summary such as `8 Gb B-die (18nm)`.
 */
export function describeDie(capacityMbit: number, die: DieInfo | undefined): string {
	if (capacityMbit <= 0) {
		return "Unknown";
	}
	const size =
		capacityMbit >= 1024 ? `${capacityMbit / 1024} Gb` : `${capacityMbit} Mb`;
	return die ? `${size} ${die.dieType} (${die.process})` : size;
}

function sameVendor(a: string, b: string): boolean {
	const left = a.toLowerCase();
	const right = b.toLowerCase();
	return left.includes(right) || right.includes(left);
}
