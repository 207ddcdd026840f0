/**
 * Intel XMP 2.0 block (SPD bytes 0x180-0x1E6)
 *
 * A 10-byte header at 0x180 is followed by two 47-byte profiles at 0x189
 * and 0x1B8. Each profile carries its own CRC-16 over its first 45 bytes.
 * Timings use the DDR4 125 ps / 1 ps timebases.
 */

import { type FieldSpec, type UIntField, readField, setField } from "../binary/field";
import {
	type ChecksumDefinition,
	type ChecksumValidation,
	refreshChecksum,
	validateChecksum,
} from "../checksum/manager";
import { FieldRangeError } from "../errors";
import { assertRawImage } from "../image";
import { decodeCasLatencies, encodeCasLatencies } from "./ddr4";
import {
	DEFAULT_TIMEBASE,
	type TimingLayout,
	clockCycles,
	readTimingNs,
	toPicoseconds,
	writeTimingNs,
} from "./timing";

export const XMP_HEADER_OFFSET = 0x180;
export const XMP_MAGIC = [0x0c, 0x4a] as const;
export const XMP_PROFILE_OFFSETS = [0x189, 0x1b8] as const;
export const XMP_PROFILE_SIZE = 47;

/** Offset of the profile CRC inside a profile */
const PROFILE_CRC_OFFSET = 0x2d;

export const XMP_HEADER_FIELDS = {
	magic0: { kind: "uint", offset: 0x180, size: 1 },
	magic1: { kind: "uint", offset: 0x181, size: 1 },
	profile1Enabled: { kind: "uint", offset: 0x182, size: 1, shift: 0, width: 1 },
	profile2Enabled: { kind: "uint", offset: 0x182, size: 1, shift: 1, width: 1 },
	profile1Dimms: { kind: "uint", offset: 0x182, size: 1, shift: 2, width: 2 },
	profile2Dimms: { kind: "uint", offset: 0x182, size: 1, shift: 4, width: 2 },
	revisionMajor: { kind: "uint", offset: 0x183, size: 1, shift: 4, width: 4 },
	revisionMinor: { kind: "uint", offset: 0x183, size: 1, shift: 0, width: 4 },
} as const satisfies Record<string, FieldSpec>;

export type XmpProfileIndex = 1 | 2;

export type XmpTimingName =
	| "tAA"
	| "tRCD"
	| "tRP"
	| "tRAS"
	| "tRC"
	| "tRFC1"
	| "tRFC2"
	| "tRFC4"
	| "tFAW"
	| "tRRD_S"
	| "tRRD_L"
	| "tCCD_L";

/** Profile timings in nanoseconds */
export type XmpTimings = Record<XmpTimingName, number>;

export const XMP_TIMING_NAMES: readonly XmpTimingName[] = [
	"tAA",
	"tRCD",
	"tRP",
	"tRAS",
	"tRC",
	"tRFC1",
	"tRFC2",
	"tRFC4",
	"tFAW",
	"tRRD_S",
	"tRRD_L",
	"tCCD_L",
];

export interface XmpProfile {
	index: XmpProfileIndex;
	enabled: boolean;
	dimmsPerChannel: number;
	/** Module voltage in volts */
	voltage: number;
	/** Cycle time in ns */
	tCK: number;
	// Derived from tCK
	frequencyMHz: number;
	dataRate: number;
	casLatencies: number[];
	timings: XmpTimings;
	/** Primary timings in clock cycles (derived) */
	cycles: { CL: number; tRCD: number; tRP: number; tRAS: number };
	checksum: ChecksumValidation;
	checksumValid: boolean;
}

export interface XmpRevision {
	major: number;
	minor: number;
}

export interface XmpBlock {
	present: boolean;
	revision: XmpRevision | null;
	profiles: [XmpProfile | null, XmpProfile | null];
}

export interface XmpEncodeOptions {
	/** @default "changed" */
	recomputeChecksums?: "changed" | "always";
}

/** Profile-relative byte layout */
const PROFILE_FIELDS = {
	voltage: rel(0x00),
	tCK: { medium: rel(0x03), fine: relSigned(0x2c) },
	casLatencyMask: { kind: "uint", offset: 0x04, size: 4, endian: "le" },
} as const;

const PROFILE_TIMINGS: Readonly<Record<XmpTimingName, TimingLayout>> = {
	tAA: { medium: rel(0x08), fine: relSigned(0x2b) },
	tRCD: { medium: rel(0x09), fine: relSigned(0x2a) },
	tRP: { medium: rel(0x0a), fine: relSigned(0x29) },
	tRAS: { medium: rel(0x0c), mediumHigh: relNibble(0x0b, 0) },
	tRC: { medium: rel(0x0d), mediumHigh: relNibble(0x0b, 4), fine: relSigned(0x28) },
	tRFC1: { medium: relU16(0x0e) },
	tRFC2: { medium: relU16(0x10) },
	tRFC4: { medium: relU16(0x12) },
	tFAW: { medium: rel(0x15), mediumHigh: relNibble(0x14, 0) },
	tRRD_S: { medium: rel(0x16), fine: relSigned(0x27) },
	tRRD_L: { medium: rel(0x17), fine: relSigned(0x26) },
	tCCD_L: { medium: rel(0x18), fine: relSigned(0x25) },
};

/** Checksum definition for one profile */
export function xmpProfileChecksum(index: XmpProfileIndex): ChecksumDefinition {
	const base = profileBase(index);
	return {
		name: `xmp.profile${index}`,
		algorithm: "crc16",
		regions: [{ start: base, end: base + PROFILE_CRC_OFFSET }],
		storage: { offset: base + PROFILE_CRC_OFFSET, size: 2, endianness: "le" },
	};
}

/**
 * Decode the XMP block of an SPD image.
 *
 * A missing magic marker is not an error: most modules carry no XMP data
 * and decode to `{ present: false }`.
 *
 * @throws InvalidImageSizeError if the image is not 512 bytes
 */
export function decodeXmp(image: Uint8Array): XmpBlock {
	assertRawImage(image);
	const h = XMP_HEADER_FIELDS;

	if (!hasMagic(image)) {
		return { present: false, revision: null, profiles: [null, null] };
	}

	const profile1 =
		readField(image, h.profile1Enabled) === 1
			? decodeProfile(image, 1, readField(image, h.profile1Dimms) + 1)
			: null;
	const profile2 =
		readField(image, h.profile2Enabled) === 1
			? decodeProfile(image, 2, readField(image, h.profile2Dimms) + 1)
			: null;

	return {
		present: true,
		revision: {
			major: readField(image, h.revisionMajor),
			minor: readField(image, h.revisionMinor),
		},
		profiles: [profile1, profile2],
	};
}

/**
 * Write an edited XMP block over the image it was decoded from.
 *
 * The header is written when the original had none. A profile set to
 * `null` or `enabled: false` has its enable bit cleared and its bytes left
 * in place. Each profile CRC is recomputed only when that profile's bytes
 * changed (or always, when forced). `present: false` clears the magic
 * marker and both enable bits.
 *
 * @throws FieldRangeError if an edited value cannot be represented
 */
export function encodeXmp(
	block: XmpBlock,
	original: Uint8Array,
	options: XmpEncodeOptions = {},
): Uint8Array {
	assertRawImage(original);
	const image = new Uint8Array(original);
	const h = XMP_HEADER_FIELDS;
	const hadHeader = hasMagic(original);

	if (!block.present) {
		if (hadHeader) {
			setField(image, h.magic0, 0, "xmp.magic");
			setField(image, h.magic1, 0, "xmp.magic");
			setField(image, h.profile1Enabled, 0, "xmp.profile1");
			setField(image, h.profile2Enabled, 0, "xmp.profile2");
		}
		return image;
	}

	if (!hadHeader) {
		setField(image, h.magic0, XMP_MAGIC[0], "xmp.magic");
		setField(image, h.magic1, XMP_MAGIC[1], "xmp.magic");
		setField(image, h.profile1Enabled, 0, "xmp.profile1");
		setField(image, h.profile2Enabled, 0, "xmp.profile2");
	}

	const revision = block.revision ?? { major: 2, minor: 0 };
	const currentRevision = {
		major: readField(image, h.revisionMajor),
		minor: readField(image, h.revisionMinor),
	};
	if (
		!hadHeader ||
		revision.major !== currentRevision.major ||
		revision.minor !== currentRevision.minor
	) {
		setField(image, h.revisionMajor, revision.major, "xmp.revision.major");
		setField(image, h.revisionMinor, revision.minor, "xmp.revision.minor");
	}

	const force = options.recomputeChecksums === "always";
	const indices: XmpProfileIndex[] = [1, 2];
	for (const index of indices) {
		const profile = block.profiles[index - 1] ?? null;
		const enabledField = index === 1 ? h.profile1Enabled : h.profile2Enabled;
		const dimmsField = index === 1 ? h.profile1Dimms : h.profile2Dimms;

		if (!profile) {
			setField(image, enabledField, 0, `xmp.profile${index}`);
			continue;
		}

		setField(image, enabledField, profile.enabled ? 1 : 0, `xmp.profile${index}.enabled`);
		if (readField(image, dimmsField) + 1 !== profile.dimmsPerChannel) {
			setField(
				image,
				dimmsField,
				profile.dimmsPerChannel - 1,
				`xmp.profile${index}.dimmsPerChannel`,
			);
		}

		encodeProfile(image, index, profile, decodeProfile(original, index, 1));
		refreshChecksum(original, image, xmpProfileChecksum(index), force);
	}

	return image;
}

/**
 * Build a fresh, enabled profile for insertion into an XMP block.
 * Defaults describe DDR4-3200 16-18-18-38 at 1.35 V.
 *
 * @example
 * ```typescript
 * const block = decodeXmp(image);
 * block.present = true;
 * block.profiles[0] = createXmpProfile(1, { tCK: 0.75, voltage: 1.2 });
 * const patched = encodeXmp(block, image);
 * ```
 */
export function createXmpProfile(
	index: XmpProfileIndex,
	overrides: {
		voltage?: number;
		tCK?: number;
		dimmsPerChannel?: number;
		casLatencies?: number[];
		timings?: Partial<XmpTimings>;
	} = {},
): XmpProfile {
	const tCK = overrides.tCK ?? 0.625;
	const timings: XmpTimings = {
		tAA: 10,
		tRCD: 11.25,
		tRP: 11.25,
		tRAS: 23.75,
		tRC: 35,
		tRFC1: 350,
		tRFC2: 260,
		tRFC4: 160,
		tFAW: 21,
		tRRD_S: 2.5,
		tRRD_L: 4.9,
		tCCD_L: 5,
		...overrides.timings,
	};
	return {
		index,
		enabled: true,
		dimmsPerChannel: overrides.dimmsPerChannel ?? 1,
		voltage: overrides.voltage ?? 1.35,
		tCK,
		...clockDerived(tCK),
		casLatencies: overrides.casLatencies ?? [14, 15, 16, 17, 18, 19, 20],
		timings,
		cycles: cyclesFor(timings, tCK),
		checksum: { valid: true, expected: 0, actual: 0, algorithm: "crc16" },
		checksumValid: true,
	};
}

/**
 * Voltage byte: bit 7 counts whole volts, bits 6:0 hundredths.
 *
 * @example
 * decodeXmpVoltage(0xa3); // => 1.35
 */
export function decodeXmpVoltage(byte: number): number {
	const volts = (byte >> 7) & 1;
	const hundredths = byte & 0x7f;
	return (volts * 100 + hundredths) / 100;
}

/**
 * @throws FieldRangeError outside 0.00-1.99 V
 */
export function encodeXmpVoltage(voltage: number, field = "voltage"): number {
	const hundredths = Math.round(voltage * 100);
	if (!Number.isFinite(voltage) || hundredths < 0 || hundredths > 199) {
		throw new FieldRangeError(field, voltage, `${field}: ${voltage} V is outside 0.00-1.99 V`);
	}
	const volts = Math.floor(hundredths / 100);
	const rest = hundredths % 100;
	return (volts << 7) | rest;
}

function decodeProfile(
	image: Uint8Array,
	index: XmpProfileIndex,
	dimmsPerChannel: number,
): XmpProfile {
	const base = profileBase(index);
	const at = (field: UIntField): UIntField => ({ ...field, offset: base + field.offset });

	const tCK = readTimingNs(image, shiftLayout(PROFILE_FIELDS.tCK, base), DEFAULT_TIMEBASE);

	const read = (name: XmpTimingName) =>
		readTimingNs(image, shiftLayout(PROFILE_TIMINGS[name], base), DEFAULT_TIMEBASE);
	const timings: XmpTimings = {
		tAA: read("tAA"),
		tRCD: read("tRCD"),
		tRP: read("tRP"),
		tRAS: read("tRAS"),
		tRC: read("tRC"),
		tRFC1: read("tRFC1"),
		tRFC2: read("tRFC2"),
		tRFC4: read("tRFC4"),
		tFAW: read("tFAW"),
		tRRD_S: read("tRRD_S"),
		tRRD_L: read("tRRD_L"),
		tCCD_L: read("tCCD_L"),
	};

	const checksum = validateChecksum(image, xmpProfileChecksum(index));

	return {
		index,
		enabled: true,
		dimmsPerChannel,
		voltage: decodeXmpVoltage(readField(image, at(PROFILE_FIELDS.voltage))),
		tCK,
		...clockDerived(tCK),
		casLatencies: decodeCasLatencies(readField(image, at(PROFILE_FIELDS.casLatencyMask))),
		timings,
		cycles: cyclesFor(timings, tCK),
		checksum,
		checksumValid: checksum.valid,
	};
}

/** Writes into the slot at `index`; `profile.index` only names where it was decoded from */
function encodeProfile(
	image: Uint8Array,
	index: XmpProfileIndex,
	profile: XmpProfile,
	before: XmpProfile,
): void {
	const base = profileBase(index);
	const prefix = `xmp.profile${index}`;
	const at = (field: UIntField): UIntField => ({ ...field, offset: base + field.offset });

	if (Math.round(profile.voltage * 100) !== Math.round(before.voltage * 100)) {
		setField(
			image,
			at(PROFILE_FIELDS.voltage),
			encodeXmpVoltage(profile.voltage, `${prefix}.voltage`),
			`${prefix}.voltage`,
		);
	}

	if (toPicoseconds(profile.tCK) !== toPicoseconds(before.tCK)) {
		writeTimingNs(
			image,
			shiftLayout(PROFILE_FIELDS.tCK, base),
			profile.tCK,
			DEFAULT_TIMEBASE,
			`${prefix}.tCK`,
		);
	}

	const latencies = [...profile.casLatencies].sort((a, b) => a - b).join(",");
	const beforeLatencies = [...before.casLatencies].sort((a, b) => a - b).join(",");
	if (latencies !== beforeLatencies) {
		setField(
			image,
			at(PROFILE_FIELDS.casLatencyMask),
			encodeCasLatencies(profile.casLatencies),
			`${prefix}.casLatencies`,
		);
	}

	for (const name of XMP_TIMING_NAMES) {
		if (toPicoseconds(profile.timings[name]) === toPicoseconds(before.timings[name])) {
			continue;
		}
		writeTimingNs(
			image,
			shiftLayout(PROFILE_TIMINGS[name], base),
			profile.timings[name],
			DEFAULT_TIMEBASE,
			`${prefix}.timings.${name}`,
		);
	}
}

function clockDerived(tCK: number): { frequencyMHz: number; dataRate: number } {
	const ps = toPicoseconds(tCK);
	if (ps <= 0) {
		return { frequencyMHz: 0, dataRate: 0 };
	}
	return {
		frequencyMHz: Math.round(100_000_000 / ps) / 100,
		dataRate: Math.round(2_000_000 / ps),
	};
}

function cyclesFor(timings: XmpTimings, tCK: number): XmpProfile["cycles"] {
	return {
		CL: clockCycles(timings.tAA, tCK),
		tRCD: clockCycles(timings.tRCD, tCK),
		tRP: clockCycles(timings.tRP, tCK),
		tRAS: clockCycles(timings.tRAS, tCK),
	};
}

function hasMagic(image: Uint8Array): boolean {
	return (
		readField(image, XMP_HEADER_FIELDS.magic0) === XMP_MAGIC[0] &&
		readField(image, XMP_HEADER_FIELDS.magic1) === XMP_MAGIC[1]
	);
}

function profileBase(index: XmpProfileIndex): number {
	return XMP_PROFILE_OFFSETS[index - 1];
}

function shiftLayout(layout: TimingLayout, base: number): TimingLayout {
	return {
		medium: { ...layout.medium, offset: base + layout.medium.offset },
		...(layout.mediumHigh && {
			mediumHigh: { ...layout.mediumHigh, offset: base + layout.mediumHigh.offset },
		}),
		...(layout.fine && {
			fine: { ...layout.fine, offset: base + layout.fine.offset },
		}),
	};
}

function rel(offset: number) {
	return { kind: "uint", offset, size: 1 } as const;
}

function relSigned(offset: number) {
	return { kind: "int", offset, size: 1 } as const;
}

function relNibble(offset: number, shift: number) {
	return { kind: "uint", offset, size: 1, shift, width: 4 } as const;
}

function relU16(offset: number) {
	return { kind: "uint", offset, size: 2, endian: "le" } as const;
}
