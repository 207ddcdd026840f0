/**
 * DDR4 SPD byte map (JEDEC Standard No. 21-C, Annex L)
 *
 * Offsets are absolute within the 512-byte image. Packed fields give their
 * bit range LSB-first. Timing parameters are grouped into
 * {@link DDR4_TIMING_LAYOUTS} because each spans a medium field, an
 * optional high nibble and an optional fine correction byte.
 */

import type { FieldSpec } from "../binary/field";
import type { ChecksumDefinition } from "../checksum/manager";
import type { TimingLayout } from "./timing";

/** DRAM device type byte value identifying DDR4 SDRAM */
export const DDR4_DEVICE_TYPE = 0x0c;

export const DDR4_FIELDS = {
	// Bytes 0-2: SPD size, revision, device type
	bytesUsedCode: { kind: "uint", offset: 0, size: 1, shift: 0, width: 4 },
	bytesTotalCode: { kind: "uint", offset: 0, size: 1, shift: 4, width: 3 },
	spdRevision: { kind: "uint", offset: 1, size: 1 },
	deviceType: { kind: "uint", offset: 2, size: 1 },
	moduleType: { kind: "uint", offset: 3, size: 1, shift: 0, width: 4 },
	hybridModule: { kind: "uint", offset: 3, size: 1, shift: 4, width: 4 },

	// Byte 4: SDRAM density and banks
	capacityCode: { kind: "uint", offset: 4, size: 1, shift: 0, width: 4 },
	bankAddressCode: { kind: "uint", offset: 4, size: 1, shift: 4, width: 2 },
	bankGroupCode: { kind: "uint", offset: 4, size: 1, shift: 6, width: 2 },

	// Byte 5: addressing
	columnCode: { kind: "uint", offset: 5, size: 1, shift: 0, width: 3 },
	rowCode: { kind: "uint", offset: 5, size: 1, shift: 3, width: 3 },

	// Byte 6: primary package type
	signalLoading: { kind: "uint", offset: 6, size: 1, shift: 0, width: 2 },
	dieCountCode: { kind: "uint", offset: 6, size: 1, shift: 4, width: 3 },
	nonMonolithic: { kind: "uint", offset: 6, size: 1, shift: 7, width: 1 },

	// Byte 11: module nominal voltage
	nominalVoltage: { kind: "uint", offset: 11, size: 1 },

	// Byte 12: module organization
	sdramWidthCode: { kind: "uint", offset: 12, size: 1, shift: 0, width: 3 },
	packageRanksCode: { kind: "uint", offset: 12, size: 1, shift: 3, width: 3 },
	rankMix: { kind: "uint", offset: 12, size: 1, shift: 6, width: 1 },

	// Byte 13: module memory bus width
	busWidthCode: { kind: "uint", offset: 13, size: 1, shift: 0, width: 3 },
	busWidthExtension: { kind: "uint", offset: 13, size: 1, shift: 3, width: 2 },

	// Byte 14: thermal sensor
	thermalSensor: { kind: "uint", offset: 14, size: 1, shift: 7, width: 1 },

	// Byte 17: timebases
	fineTimebaseCode: { kind: "uint", offset: 17, size: 1, shift: 0, width: 2 },
	mediumTimebaseCode: { kind: "uint", offset: 17, size: 1, shift: 2, width: 2 },

	// Bytes 20-23: CAS latencies supported (bit 31 selects the high range)
	casLatencyMask: { kind: "uint", offset: 20, size: 4, endian: "le" },

	// Bytes 126-127, 254-255: CRCs
	baseCrc: { kind: "uint", offset: 126, size: 2, endian: "le" },
	moduleCrc: { kind: "uint", offset: 254, size: 2, endian: "le" },

	// Bytes 320-352: manufacturing information
	manufacturerBank: { kind: "uint", offset: 320, size: 1 },
	manufacturerCode: { kind: "uint", offset: 321, size: 1 },
	manufacturingLocation: { kind: "uint", offset: 322, size: 1 },
	manufacturingYear: { kind: "uint", offset: 323, size: 1 },
	manufacturingWeek: { kind: "uint", offset: 324, size: 1 },
	serialNumber: { kind: "bytes", offset: 325, length: 4 },
	partNumber: { kind: "text", offset: 329, length: 20, pad: " " },
	moduleRevision: { kind: "uint", offset: 349, size: 1 },
	dramManufacturerBank: { kind: "uint", offset: 350, size: 1 },
	dramManufacturerCode: { kind: "uint", offset: 351, size: 1 },
	dramStepping: { kind: "uint", offset: 352, size: 1 },
} as const satisfies Record<string, FieldSpec>;

export type Ddr4FieldName = keyof typeof DDR4_FIELDS;

/** Names of the timing parameters stored in the base configuration block */
export type Ddr4TimingName =
	| "tCKmin"
	| "tCKmax"
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

export const DDR4_TIMING_NAMES: readonly Ddr4TimingName[] = [
	"tCKmin",
	"tCKmax",
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

const u8 = (offset: number) => ({ kind: "uint", offset, size: 1 }) as const;
const i8 = (offset: number) => ({ kind: "int", offset, size: 1 }) as const;
const nibble = (offset: number, shift: number) =>
	({ kind: "uint", offset, size: 1, shift, width: 4 }) as const;
const u16 = (offset: number) =>
	({ kind: "uint", offset, size: 2, endian: "le" }) as const;

export const DDR4_TIMING_LAYOUTS: Readonly<Record<Ddr4TimingName, TimingLayout>> = {
	tCKmin: { medium: u8(18), fine: i8(125) },
	tCKmax: { medium: u8(19), fine: i8(124) },
	tAA: { medium: u8(24), fine: i8(123) },
	tRCD: { medium: u8(25), fine: i8(122) },
	tRP: { medium: u8(26), fine: i8(121) },
	tRAS: { medium: u8(28), mediumHigh: nibble(27, 0) },
	tRC: { medium: u8(29), mediumHigh: nibble(27, 4), fine: i8(120) },
	tRFC1: { medium: u16(30) },
	tRFC2: { medium: u16(32) },
	tRFC4: { medium: u16(34) },
	tFAW: { medium: u8(37), mediumHigh: nibble(36, 0) },
	tRRD_S: { medium: u8(38), fine: i8(119) },
	tRRD_L: { medium: u8(39), fine: i8(118) },
	tCCD_L: { medium: u8(40), fine: i8(117) },
};

/** CRC over the base configuration block (bytes 0-125) */
export const DDR4_BASE_CHECKSUM: ChecksumDefinition = {
	name: "base",
	algorithm: "crc16",
	regions: [{ start: 0, end: 126 }],
	storage: { offset: 126, size: 2, endianness: "le" },
};

/** CRC over the module-specific block (bytes 128-253) */
export const DDR4_MODULE_CHECKSUM: ChecksumDefinition = {
	name: "module",
	algorithm: "crc16",
	regions: [{ start: 128, end: 254 }],
	storage: { offset: 254, size: 2, endianness: "le" },
};

/** Module type names by byte 3 bits 3:0 */
export const DDR4_MODULE_TYPES: Readonly<Record<number, string>> = {
	0x01: "RDIMM",
	0x02: "UDIMM",
	0x03: "SO-DIMM",
	0x04: "LRDIMM",
	0x05: "Mini-RDIMM",
	0x06: "Mini-UDIMM",
	0x08: "72b-SO-RDIMM",
	0x09: "72b-SO-UDIMM",
	0x0c: "16b-SO-DIMM",
	0x0d: "32b-SO-DIMM",
};

/** SDRAM capacity per die in Mbit, by byte 4 bits 3:0 */
export const DDR4_CAPACITY_MBIT: Readonly<Record<number, number>> = {
	0: 256,
	1: 512,
	2: 1024,
	3: 2048,
	4: 4096,
	5: 8192,
	6: 16384,
	7: 32768,
	8: 12288,
	9: 24576,
};

/** Banks per group, by byte 4 bits 5:4 */
export const DDR4_BANKS_PER_GROUP: Readonly<Record<number, number>> = {
	0: 4,
	1: 8,
};

/** Bank groups, by byte 4 bits 7:6 (0 = no bank groups) */
export const DDR4_BANK_GROUPS: Readonly<Record<number, number>> = {
	0: 0,
	1: 2,
	2: 4,
};

/** SDRAM I/O width in bits, by byte 12 bits 2:0 */
export const DDR4_SDRAM_WIDTH: Readonly<Record<number, number>> = {
	0: 4,
	1: 8,
	2: 16,
	3: 32,
};

/** Primary bus width in bits, by byte 13 bits 2:0 */
export const DDR4_BUS_WIDTH: Readonly<Record<number, number>> = {
	0: 8,
	1: 16,
	2: 32,
	3: 64,
};

/** Signal loading code for a multi-load (3DS) stack */
export const SIGNAL_LOADING_3DS = 2;

/**
 * JEDEC speed bins: tCKmin range in ps `[min, max)` -> data rate in MT/s
 */
export const DDR4_SPEED_BINS: readonly { minPs: number; maxPs: number; dataRate: number }[] = [
	{ minPs: 625, maxPs: 750, dataRate: 3200 },
	{ minPs: 750, maxPs: 833, dataRate: 2666 },
	{ minPs: 833, maxPs: 938, dataRate: 2400 },
	{ minPs: 938, maxPs: 1071, dataRate: 2133 },
	{ minPs: 1071, maxPs: 1250, dataRate: 1866 },
	{ minPs: 1250, maxPs: 1500, dataRate: 1600 },
];
