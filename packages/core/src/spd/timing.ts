/**
 * Two-level timebase encoding used by DDR4 SPD and XMP timing parameters.
 *
 * A timing is stored as a count of medium timebase units (MTB) plus a signed
 * correction in fine timebase units (FTB):
 *
 *     time(ps) = medium * MTB + fine * FTB
 *
 * Some parameters (tRAS, tRFCx, tFAW) have no fine byte. Wide parameters
 * split their medium count over a low byte and a high nibble.
 */

import { setField, readField } from "../binary/field";
import type { IntField, UIntField } from "../binary/field";
import { FieldRangeError } from "../errors";

/** Medium timebase in picoseconds, indexed by SPD byte 17 bits 3:2 */
export const MEDIUM_TIMEBASE_PS: Readonly<Record<number, number>> = {
	0: 125,
	1: 250,
	2: 1000,
};

/** Fine timebase in picoseconds, indexed by SPD byte 17 bits 1:0 */
export const FINE_TIMEBASE_PS: Readonly<Record<number, number>> = {
	0: 1,
};

export interface Timebase {
	mediumCode: number;
	fineCode: number;
	/** Medium timebase in ps */
	mediumPs: number;
	/** Fine timebase in ps */
	finePs: number;
}

/** XMP 2.0 and DDR4 SPD revision 1.x both use 125 ps / 1 ps */
export const DEFAULT_TIMEBASE: Timebase = {
	mediumCode: 0,
	fineCode: 0,
	mediumPs: 125,
	finePs: 1,
};

/**
 * Resolve timebase codes to durations.
 *
 * @returns null when either code is reserved
 */
export function resolveTimebase(
	mediumCode: number,
	fineCode: number,
): Timebase | null {
	const mediumPs = MEDIUM_TIMEBASE_PS[mediumCode];
	const finePs = FINE_TIMEBASE_PS[fineCode];
	if (mediumPs === undefined || finePs === undefined) {
		return null;
	}
	return { mediumCode, fineCode, mediumPs, finePs };
}

/** Where the parts of one timing parameter live in an image */
export interface TimingLayout {
	/** Medium count, or its low byte when `mediumHigh` is present */
	medium: UIntField;
	/** Upper bits of the medium count (placed above the low field) */
	mediumHigh?: UIntField;
	/** Signed fine correction */
	fine?: IntField;
}

/** Medium/fine pair as stored */
export interface EncodedTiming {
	medium: number;
	fine: number;
}

/** Round a nanosecond value to whole picoseconds */
export function toPicoseconds(ns: number): number {
	return Math.round(ns * 1000);
}

/**
 * Combine medium and fine counts into nanoseconds.
 *
 * @example
 * // DDR4-2400 tCKmin: 7 * 125 ps - 42 ps = 833 ps
 * timingToNs({ medium: 7, fine: -42 }, DEFAULT_TIMEBASE); // => 0.833
 */
export function timingToNs(encoded: EncodedTiming, timebase: Timebase): number {
	const ps = encoded.medium * timebase.mediumPs + encoded.fine * timebase.finePs;
	return ps / 1000;
}

/**
 * Split a nanosecond value into medium and fine counts.
 *
 * The medium count is rounded up so that the fine correction is zero or
 * negative, which is how JEDEC tables list their values. When that puts
 * the correction outside a signed byte (coarse timebases), the medium count
 * is rounded to nearest instead.
 *
 * @param mediumMax - Largest medium count the layout can hold
 * @param hasFine - Whether the layout has a fine correction byte
 * @throws FieldRangeError if no representation fits
 */
export function nsToTiming(
	ns: number,
	timebase: Timebase,
	mediumMax: number,
	hasFine: boolean,
	field = "timing",
): EncodedTiming {
	if (!Number.isFinite(ns) || ns < 0) {
		throw new FieldRangeError(field, ns, `${field}: ${ns} ns is not a valid duration`);
	}

	const ps = toPicoseconds(ns);
	const candidates = hasFine
		? [Math.ceil(ps / timebase.mediumPs), Math.round(ps / timebase.mediumPs)]
		: [Math.round(ps / timebase.mediumPs)];

	for (const medium of candidates) {
		if (medium < 0 || medium > mediumMax) {
			continue;
		}
		if (!hasFine) {
			return { medium, fine: 0 };
		}
		const fine = Math.round((ps - medium * timebase.mediumPs) / timebase.finePs);
		if (fine >= -128 && fine <= 127) {
			return { medium, fine };
		}
	}

	throw new FieldRangeError(
		field,
		ns,
		`${field}: ${ns} ns cannot be encoded with a ${timebase.mediumPs} ps timebase`,
	);
}

/** Largest medium count a layout can hold */
export function mediumCapacity(layout: TimingLayout): number {
	const lowBits = layout.medium.width ?? layout.medium.size * 8;
	const highBits = layout.mediumHigh
		? (layout.mediumHigh.width ?? layout.mediumHigh.size * 8)
		: 0;
	return 2 ** (lowBits + highBits) - 1;
}

/** Read the medium/fine pair of one timing parameter */
export function readTiming(image: Uint8Array, layout: TimingLayout): EncodedTiming {
	let medium = readField(image, layout.medium);
	if (layout.mediumHigh) {
		const lowBits = layout.medium.width ?? layout.medium.size * 8;
		medium += readField(image, layout.mediumHigh) * 2 ** lowBits;
	}
	const fine = layout.fine ? readField(image, layout.fine) : 0;
	return { medium, fine };
}

/** Decode one timing parameter to nanoseconds */
export function readTimingNs(
	image: Uint8Array,
	layout: TimingLayout,
	timebase: Timebase,
): number {
	return timingToNs(readTiming(image, layout), timebase);
}

/**
 * Encode one timing parameter into `image` (in place).
 *
 * @throws FieldRangeError if the value does not fit the layout
 */
export function writeTimingNs(
	image: Uint8Array,
	layout: TimingLayout,
	ns: number,
	timebase: Timebase,
	field: string,
): void {
	const encoded = nsToTiming(
		ns,
		timebase,
		mediumCapacity(layout),
		layout.fine !== undefined,
		field,
	);

	if (layout.mediumHigh) {
		const lowBits = layout.medium.width ?? layout.medium.size * 8;
		const lowMax = 2 ** lowBits;
		setField(image, layout.medium, encoded.medium % lowMax, field);
		setField(image, layout.mediumHigh, Math.floor(encoded.medium / lowMax), field);
	} else {
		setField(image, layout.medium, encoded.medium, field);
	}

	if (layout.fine) {
		setField(image, layout.fine, encoded.fine, field);
	}
}

/**
 * Whole clock cycles for a duration at a given tCK, rounded to nearest.
 *
 * @example
 * clockCycles(13.75, 0.833); // => 17
 */
export function clockCycles(ns: number, tCK: number): number {
	if (tCK <= 0) {
		return 0;
	}
	return Math.round(ns / tCK);
}
