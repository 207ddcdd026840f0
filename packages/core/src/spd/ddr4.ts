/**
 * DDR4 SPD decoder and encoder
 *
 * {@link decodeDdr4} turns a 512-byte image into a {@link Ddr4Record}.
 * {@link encodeDdr4} writes an edited record back over the image it came
 * from: every editable property is compared with the decode of that image
 * and only changed properties are written, so bytes the record does not
 * model pass through untouched.
 */

import { type UIntField, readField, setField } from "../binary/field";
import {
	type ChecksumValidation,
	refreshChecksum,
	validateChecksum,
} from "../checksum/manager";
import { FieldRangeError, UnsupportedFormatError } from "../errors";
import { assertRawImage } from "../image";
import {
	DDR4_BANK_GROUPS,
	DDR4_BANKS_PER_GROUP,
	DDR4_BASE_CHECKSUM,
	DDR4_BUS_WIDTH,
	DDR4_CAPACITY_MBIT,
	DDR4_DEVICE_TYPE,
	DDR4_FIELDS,
	DDR4_MODULE_CHECKSUM,
	DDR4_MODULE_TYPES,
	DDR4_SDRAM_WIDTH,
	DDR4_SPEED_BINS,
	DDR4_TIMING_LAYOUTS,
	DDR4_TIMING_NAMES,
	type Ddr4TimingName,
	SIGNAL_LOADING_3DS,
} from "./ddr4-fields";
import {
	type ManufacturerId,
	type ManufacturerLookup,
	decodeManufacturer,
	defaultManufacturerLookup,
	encodeBankByte,
} from "./manufacturer";
import {
	type Timebase,
	clockCycles,
	readTimingNs,
	resolveTimebase,
	toPicoseconds,
	writeTimingNs,
} from "./timing";

export type SpdIssueCode = "UnsupportedFormat" | "ChecksumMismatch" | "InvalidField";

/** Advisory attached to a decoded record; decoding never stops on these */
export interface SpdIssue {
	code: SpdIssueCode;
	/** Record property the issue concerns */
	field?: string;
	message: string;
}

export interface ModuleType {
	code: number;
	name: string;
}

/**
 * SDRAM organization and the capacity derived from it.
 * Every intermediate of the capacity formula is exposed.
 */
export interface Density {
	/** Capacity of one die in Mbit */
	capacityMbit: number;
	/** 0 when the device has no bank groups */
	bankGroups: number;
	banksPerGroup: number;
	rowBits: number;
	columnBits: number;
	/** Primary package signal loading code (2 = 3DS multi-load stack) */
	signalLoading: number;
	dieCount: number;
	nonMonolithic: boolean;
	/** SDRAM I/O width in bits */
	sdramWidth: number;
	packageRanks: number;
	/** Primary bus width in bits */
	busWidth: number;
	/** Bus width extension (ECC) in bits */
	eccBits: number;
	// Derived
	is3ds: boolean;
	totalBanks: number;
	logicalRanks: number;
	totalMiB: number;
}

/** Timing parameters in nanoseconds */
export type Ddr4Timings = Record<Ddr4TimingName, number>;

export interface ManufacturingDate {
	year: number;
	week: number;
}

export interface Ddr4Record {
	/** True when the device type byte is DDR4 */
	valid: boolean;
	bytesUsed: number | null;
	bytesTotal: number | null;
	/** Encoded revision, e.g. 0x11 for 1.1 */
	spdRevision: number;
	deviceType: number;
	moduleType: ModuleType;
	density: Density | null;
	timebase: Timebase | null;
	timings: Ddr4Timings | null;
	/** tCKmin in ns */
	minCycleTime: number | null;
	casLatencies: number[];
	/** Data rate in MT/s */
	speedGrade: number | null;
	/** `CLx-tRCD-tRP-tRAS` in clock cycles */
	timingString: string | null;
	manufacturer: ManufacturerId;
	dramManufacturer: ManufacturerId;
	manufacturingLocation: number;
	manufacturingDate: ManufacturingDate | null;
	partNumber: string;
	/** Eight upper-case hex digits */
	serialNumber: string;
	moduleRevision: number;
	dramStepping: number;
	checksums: {
		base: ChecksumValidation;
		module: ChecksumValidation;
	};
	/** Base configuration block CRC matches */
	checksumValid: boolean;
	issues: SpdIssue[];
}

export interface DecodeOptions {
	manufacturers?: ManufacturerLookup;
}

export interface EncodeOptions {
	/**
	 * `"changed"` rewrites a CRC only when bytes it covers changed;
	 * `"always"` rewrites both.
	 * @default "changed"
	 */
	recomputeChecksums?: "changed" | "always";
}

const BYTES_USED: Readonly<Record<number, number>> = { 1: 128, 2: 256, 3: 384, 4: 512 };
const BYTES_TOTAL: Readonly<Record<number, number>> = { 1: 256, 2: 512 };
const ECC_BITS: Readonly<Record<number, number>> = { 0: 0, 1: 8 };

/** CAS latency bitmap: 30 usable bits, bit 31 selects the high range */
const CAS_RANGE_BITS = 30;
const CAS_LOW_BASE = 7;
const CAS_HIGH_BASE = 23;
const CAS_HIGH_RANGE_FLAG = 0x8000_0000;

/**
 * Decode a DDR4 SPD image.
 *
 * Decoding is pure and never throws for content problems: an unexpected
 * device type, a reserved code or a bad CRC becomes an entry in `issues`
 * and the affected property is `null`.
 *
 * @throws InvalidImageSizeError if the image is not 512 bytes
 *
 * @example
 * ```typescript
 * const record = decodeDdr4(image);
 * if (!record.checksumValid) console.warn(record.issues);
 * console.log(record.density?.totalMiB, record.timingString);
 * ```
 */
export function decodeDdr4(image: Uint8Array, options: DecodeOptions = {}): Ddr4Record {
	assertRawImage(image);
	const lookup = options.manufacturers ?? defaultManufacturerLookup;
	const issues: SpdIssue[] = [];
	const f = DDR4_FIELDS;

	const deviceType = readField(image, f.deviceType);
	const valid = deviceType === DDR4_DEVICE_TYPE;
	if (!valid) {
		issues.push({
			code: "UnsupportedFormat",
			field: "deviceType",
			message: `DRAM device type 0x${hex2(deviceType)} is not DDR4 (0x0C)`,
		});
	}

	const bytesUsed = lookupOrIssue(
		BYTES_USED,
		readField(image, f.bytesUsedCode),
		"bytesUsed",
		issues,
	);
	const bytesTotal = lookupOrIssue(
		BYTES_TOTAL,
		readField(image, f.bytesTotalCode),
		"bytesTotal",
		issues,
	);

	const moduleTypeCode = readField(image, f.moduleType);
	const moduleType: ModuleType = {
		code: moduleTypeCode,
		name: DDR4_MODULE_TYPES[moduleTypeCode] ?? "other",
	};

	const density = decodeDensity(image, issues);

	const timebase = resolveTimebase(
		readField(image, f.mediumTimebaseCode),
		readField(image, f.fineTimebaseCode),
	);
	if (!timebase) {
		issues.push({
			code: "InvalidField",
			field: "timebase",
			message: `Reserved timebase code in byte 17 (0x${hex2(image[17] as number)})`,
		});
	}
	const timings = timebase ? decodeTimings(image, timebase) : null;

	const checksums = {
		base: validateChecksum(image, DDR4_BASE_CHECKSUM),
		module: validateChecksum(image, DDR4_MODULE_CHECKSUM),
	};
	for (const [region, result] of Object.entries(checksums)) {
		if (!result.valid) {
			issues.push({
				code: "ChecksumMismatch",
				field: `checksums.${region}`,
				message: `${region} block CRC stored 0x${hex4(result.actual)}, computed 0x${hex4(result.expected)}`,
			});
		}
	}

	return {
		valid,
		bytesUsed,
		bytesTotal,
		spdRevision: readField(image, f.spdRevision),
		deviceType,
		moduleType,
		density,
		timebase,
		timings,
		minCycleTime: timings ? timings.tCKmin : null,
		casLatencies: decodeCasLatencies(readField(image, f.casLatencyMask)),
		speedGrade: timings ? speedGradeFor(timings.tCKmin) : null,
		timingString: timings ? formatTimingString(timings) : null,
		manufacturer: decodeManufacturer(
			readField(image, f.manufacturerBank),
			readField(image, f.manufacturerCode),
			lookup,
		),
		dramManufacturer: decodeManufacturer(
			readField(image, f.dramManufacturerBank),
			readField(image, f.dramManufacturerCode),
			lookup,
		),
		manufacturingLocation: readField(image, f.manufacturingLocation),
		manufacturingDate: decodeDate(
			readField(image, f.manufacturingYear),
			readField(image, f.manufacturingWeek),
			issues,
		),
		partNumber: readField(image, f.partNumber),
		serialNumber: Array.from(readField(image, f.serialNumber), hex2).join(""),
		moduleRevision: readField(image, f.moduleRevision),
		dramStepping: readField(image, f.dramStepping),
		checksums,
		checksumValid: checksums.base.valid,
		issues,
	};
}

/**
 * Write an edited record back over the image it was decoded from.
 *
 * `original` is never modified. When nothing editable changed and
 * checksums are not forced, the result equals `original` byte for byte,
 * including a stored CRC that was already wrong.
 *
 * @throws InvalidImageSizeError if `original` is not 512 bytes
 * @throws FieldRangeError if an edited value cannot be represented
 * @throws EncodingError if the part number is not 7-bit ASCII
 */
export function encodeDdr4(
	record: Ddr4Record,
	original: Uint8Array,
	options: EncodeOptions = {},
): Uint8Array {
	assertRawImage(original);
	const before = decodeDdr4(original);
	const image = new Uint8Array(original);
	const f = DDR4_FIELDS;

	if (record.moduleType.code !== before.moduleType.code) {
		setField(image, f.moduleType, record.moduleType.code, "moduleType");
	}

	if (record.density) {
		encodeDensity(image, record.density, before.density);
	}

	if (record.timings) {
		encodeTimings(image, record.timings, before.timings, before.timebase);
	}

	if (!sameNumbers(record.casLatencies, before.casLatencies)) {
		setField(image, f.casLatencyMask, encodeCasLatencies(record.casLatencies), "casLatencies");
	}

	if (!sameId(record.manufacturer, before.manufacturer)) {
		writeManufacturer(image, record.manufacturer, f.manufacturerBank, f.manufacturerCode, "manufacturer");
	}
	if (!sameId(record.dramManufacturer, before.dramManufacturer)) {
		writeManufacturer(
			image,
			record.dramManufacturer,
			f.dramManufacturerBank,
			f.dramManufacturerCode,
			"dramManufacturer",
		);
	}

	if (record.manufacturingLocation !== before.manufacturingLocation) {
		setField(image, f.manufacturingLocation, record.manufacturingLocation, "manufacturingLocation");
	}

	if (!sameDate(record.manufacturingDate, before.manufacturingDate)) {
		const { year, week } = encodeDate(record.manufacturingDate);
		setField(image, f.manufacturingYear, year, "manufacturingDate");
		setField(image, f.manufacturingWeek, week, "manufacturingDate");
	}

	if (record.partNumber !== before.partNumber) {
		setField(image, f.partNumber, record.partNumber, "partNumber");
	}

	if (record.serialNumber.toUpperCase() !== before.serialNumber) {
		setField(image, f.serialNumber, encodeSerial(record.serialNumber), "serialNumber");
	}

	if (record.moduleRevision !== before.moduleRevision) {
		setField(image, f.moduleRevision, record.moduleRevision, "moduleRevision");
	}
	if (record.dramStepping !== before.dramStepping) {
		setField(image, f.dramStepping, record.dramStepping, "dramStepping");
	}

	const force = options.recomputeChecksums === "always";
	refreshChecksum(original, image, DDR4_BASE_CHECKSUM, force);
	refreshChecksum(original, image, DDR4_MODULE_CHECKSUM, force);

	return image;
}

/**
 * Throw unless the record was decoded from a DDR4 image.
 *
 * @throws UnsupportedFormatError
 */
export function assertDdr4(record: Ddr4Record): void {
	if (!record.valid) {
		throw new UnsupportedFormatError(record.deviceType);
	}
}

/**
 * Data rate for a tCKmin value: the JEDEC speed bin that contains it, or
 * `2000 / tCK` rounded when it falls outside every bin.
 *
 * @example
 * speedGradeFor(0.833); // => 2400
 */
export function speedGradeFor(tCK: number): number | null {
	const ps = toPicoseconds(tCK);
	if (ps <= 0) {
		return null;
	}
	const bin = DDR4_SPEED_BINS.find((b) => ps >= b.minPs && ps < b.maxPs);
	return bin ? bin.dataRate : Math.round(2_000_000 / ps);
}

/**
 * Primary timings in clock cycles, `CL-tRCD-tRP-tRAS`.
 *
 * @example
 * formatTimingString(record.timings); // => "CL17-17-17-38"
 */
export function formatTimingString(
	timings: Pick<Ddr4Timings, "tCKmin" | "tAA" | "tRCD" | "tRP" | "tRAS">,
): string | null {
	const tCK = timings.tCKmin;
	if (tCK <= 0) {
		return null;
	}
	const cl = clockCycles(timings.tAA, tCK);
	const trcd = clockCycles(timings.tRCD, tCK);
	const trp = clockCycles(timings.tRP, tCK);
	const tras = clockCycles(timings.tRAS, tCK);
	return `CL${cl}-${trcd}-${trp}-${tras}`;
}

/**
 * Decode the 32-bit CAS latency bitmap (SPD bytes 20-23 or the XMP copy).
 */
export function decodeCasLatencies(mask: number): number[] {
	const base = mask & CAS_HIGH_RANGE_FLAG ? CAS_HIGH_BASE : CAS_LOW_BASE;
	const latencies: number[] = [];
	for (let bit = 0; bit < CAS_RANGE_BITS; bit++) {
		if (mask & (1 << bit)) {
			latencies.push(base + bit);
		}
	}
	return latencies;
}

/**
 * Encode supported CAS latencies as a bitmap. Lists reaching above CL36
 * use the high range (CL23-CL52).
 *
 * @throws FieldRangeError if a latency is outside the selected range
 */
export function encodeCasLatencies(latencies: readonly number[]): number {
	if (latencies.length === 0) {
		return 0;
	}
	const high = Math.max(...latencies) > CAS_LOW_BASE + CAS_RANGE_BITS - 1;
	const base = high ? CAS_HIGH_BASE : CAS_LOW_BASE;
	let mask = high ? CAS_HIGH_RANGE_FLAG : 0;
	for (const cl of latencies) {
		const bit = cl - base;
		if (!Number.isInteger(cl) || bit < 0 || bit >= CAS_RANGE_BITS) {
			throw new FieldRangeError(
				"casLatencies",
				cl,
				`casLatencies: CL${cl} is outside CL${base}-CL${base + CAS_RANGE_BITS - 1}`,
			);
		}
		mask |= 1 << bit;
	}
	return mask >>> 0;
}

function decodeDensity(image: Uint8Array, issues: SpdIssue[]): Density | null {
	const f = DDR4_FIELDS;

	const capacityMbit = lookupOrIssue(
		DDR4_CAPACITY_MBIT,
		readField(image, f.capacityCode),
		"density.capacityMbit",
		issues,
	);
	const bankGroups = lookupOrIssue(
		DDR4_BANK_GROUPS,
		readField(image, f.bankGroupCode),
		"density.bankGroups",
		issues,
	);
	const banksPerGroup = lookupOrIssue(
		DDR4_BANKS_PER_GROUP,
		readField(image, f.bankAddressCode),
		"density.banksPerGroup",
		issues,
	);
	const sdramWidth = lookupOrIssue(
		DDR4_SDRAM_WIDTH,
		readField(image, f.sdramWidthCode),
		"density.sdramWidth",
		issues,
	);
	const busWidth = lookupOrIssue(
		DDR4_BUS_WIDTH,
		readField(image, f.busWidthCode),
		"density.busWidth",
		issues,
	);
	const eccBits = lookupOrIssue(
		ECC_BITS,
		readField(image, f.busWidthExtension),
		"density.eccBits",
		issues,
	);

	if (
		capacityMbit === null ||
		bankGroups === null ||
		banksPerGroup === null ||
		sdramWidth === null ||
		busWidth === null ||
		eccBits === null
	) {
		return null;
	}

	const signalLoading = readField(image, f.signalLoading);
	const dieCount = readField(image, f.dieCountCode) + 1;
	const packageRanks = readField(image, f.packageRanksCode) + 1;
	const is3ds = signalLoading === SIGNAL_LOADING_3DS;
	const logicalRanks = is3ds ? packageRanks * dieCount : packageRanks;

	return {
		capacityMbit,
		bankGroups,
		banksPerGroup,
		rowBits: readField(image, f.rowCode) + 12,
		columnBits: readField(image, f.columnCode) + 9,
		signalLoading,
		dieCount,
		nonMonolithic: readField(image, f.nonMonolithic) === 1,
		sdramWidth,
		packageRanks,
		busWidth,
		eccBits,
		is3ds,
		totalBanks: Math.max(bankGroups, 1) * banksPerGroup,
		logicalRanks,
		totalMiB: (capacityMbit / 8) * (busWidth / sdramWidth) * logicalRanks,
	};
}

function encodeDensity(image: Uint8Array, density: Density, before: Density | null): void {
	const f = DDR4_FIELDS;
	const changed = (key: keyof Density) => !before || before[key] !== density[key];

	if (changed("capacityMbit")) {
		setField(
			image,
			f.capacityCode,
			codeFor(DDR4_CAPACITY_MBIT, density.capacityMbit, "density.capacityMbit"),
			"density.capacityMbit",
		);
	}
	if (changed("bankGroups")) {
		setField(
			image,
			f.bankGroupCode,
			codeFor(DDR4_BANK_GROUPS, density.bankGroups, "density.bankGroups"),
			"density.bankGroups",
		);
	}
	if (changed("banksPerGroup")) {
		setField(
			image,
			f.bankAddressCode,
			codeFor(DDR4_BANKS_PER_GROUP, density.banksPerGroup, "density.banksPerGroup"),
			"density.banksPerGroup",
		);
	}
	if (changed("rowBits")) {
		setField(image, f.rowCode, density.rowBits - 12, "density.rowBits");
	}
	if (changed("columnBits")) {
		setField(image, f.columnCode, density.columnBits - 9, "density.columnBits");
	}
	if (changed("signalLoading")) {
		setField(image, f.signalLoading, density.signalLoading, "density.signalLoading");
	}
	if (changed("dieCount")) {
		setField(image, f.dieCountCode, density.dieCount - 1, "density.dieCount");
	}
	if (changed("nonMonolithic")) {
		setField(image, f.nonMonolithic, density.nonMonolithic ? 1 : 0, "density.nonMonolithic");
	}
	if (changed("sdramWidth")) {
		setField(
			image,
			f.sdramWidthCode,
			codeFor(DDR4_SDRAM_WIDTH, density.sdramWidth, "density.sdramWidth"),
			"density.sdramWidth",
		);
	}
	if (changed("packageRanks")) {
		setField(image, f.packageRanksCode, density.packageRanks - 1, "density.packageRanks");
	}
	if (changed("busWidth")) {
		setField(
			image,
			f.busWidthCode,
			codeFor(DDR4_BUS_WIDTH, density.busWidth, "density.busWidth"),
			"density.busWidth",
		);
	}
	if (changed("eccBits")) {
		setField(
			image,
			f.busWidthExtension,
			codeFor(ECC_BITS, density.eccBits, "density.eccBits"),
			"density.eccBits",
		);
	}
}

function decodeTimings(image: Uint8Array, timebase: Timebase): Ddr4Timings {
	const read = (name: Ddr4TimingName) =>
		readTimingNs(image, DDR4_TIMING_LAYOUTS[name], timebase);
	return {
		tCKmin: read("tCKmin"),
		tCKmax: read("tCKmax"),
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
}

function encodeTimings(
	image: Uint8Array,
	timings: Ddr4Timings,
	before: Ddr4Timings | null,
	timebase: Timebase | null,
): void {
	for (const name of DDR4_TIMING_NAMES) {
		const value = timings[name];
		if (before && toPicoseconds(before[name]) === toPicoseconds(value)) {
			continue;
		}
		if (!timebase) {
			throw new FieldRangeError(
				`timings.${name}`,
				value,
				`timings.${name}: the image has a reserved timebase code, timings cannot be encoded`,
			);
		}
		writeTimingNs(image, DDR4_TIMING_LAYOUTS[name], value, timebase, `timings.${name}`);
	}
}

function writeManufacturer(
	image: Uint8Array,
	id: ManufacturerId,
	bankField: UIntField,
	codeField: UIntField,
	name: string,
): void {
	if (!Number.isInteger(id.bank) || id.bank < 1 || id.bank > 128) {
		throw new FieldRangeError(`${name}.bank`, id.bank, `${name}.bank: ${id.bank} is outside 1-128`);
	}
	setField(image, bankField, encodeBankByte(id.bank), `${name}.bank`);
	setField(image, codeField, id.code, `${name}.code`);
}

function decodeDate(year: number, week: number, issues: SpdIssue[]): ManufacturingDate | null {
	// 00/00 and FF/FF mean no date; year byte 00 alone is 2000
	if ((year === 0x00 && week === 0x00) || year === 0xff) {
		return null;
	}
	const y = fromBcd(year);
	const w = fromBcd(week);
	if (y === null || w === null) {
		issues.push({
			code: "InvalidField",
			field: "manufacturingDate",
			message: `Manufacturing date bytes 0x${hex2(year)} 0x${hex2(week)} are not BCD`,
		});
		return null;
	}
	return { year: 2000 + y, week: w };
}

function encodeDate(date: ManufacturingDate | null): { year: number; week: number } {
	if (!date) {
		return { year: 0, week: 0 };
	}
	if (!Number.isInteger(date.year) || date.year < 2000 || date.year > 2099) {
		throw new FieldRangeError(
			"manufacturingDate.year",
			date.year,
			`manufacturingDate.year: ${date.year} is outside 2000-2099`,
		);
	}
	if (!Number.isInteger(date.week) || date.week < 0 || date.week > 53) {
		throw new FieldRangeError(
			"manufacturingDate.week",
			date.week,
			`manufacturingDate.week: ${date.week} is outside 0-53`,
		);
	}
	if (date.year === 2000 && date.week === 0) {
		throw new FieldRangeError(
			"manufacturingDate",
			"2000-W00",
			"manufacturingDate: 2000-W00 encodes as 00/00, which reads back as no date",
		);
	}
	return { year: toBcd(date.year - 2000), week: toBcd(date.week) };
}

function encodeSerial(serial: string): Uint8Array {
	if (!/^[0-9a-fA-F]{8}$/.test(serial)) {
		throw new FieldRangeError(
			"serialNumber",
			serial,
			`serialNumber: "${serial}" must be exactly 8 hex digits`,
		);
	}
	const bytes = new Uint8Array(4);
	for (let i = 0; i < 4; i++) {
		bytes[i] = Number.parseInt(serial.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}

function lookupOrIssue(
	table: Readonly<Record<number, number>>,
	code: number,
	field: string,
	issues: SpdIssue[],
): number | null {
	const value = table[code];
	if (value === undefined) {
		issues.push({
			code: "InvalidField",
			field,
			message: `${field}: reserved code ${code}`,
		});
		return null;
	}
	return value;
}

function codeFor(
	table: Readonly<Record<number, number>>,
	value: number,
	field: string,
): number {
	for (const [code, candidate] of Object.entries(table)) {
		if (candidate === value) {
			return Number(code);
		}
	}
	const allowed = Object.values(table).join(", ");
	throw new FieldRangeError(field, value, `${field}: ${value} is not one of ${allowed}`);
}

function fromBcd(value: number): number | null {
	const tens = value >> 4;
	const ones = value & 0x0f;
	return tens > 9 || ones > 9 ? null : tens * 10 + ones;
}

function toBcd(value: number): number {
	return (Math.floor(value / 10) << 4) | value % 10;
}

function sameNumbers(a: readonly number[], b: readonly number[]): boolean {
	const left = [...a].sort((x, y) => x - y);
	const right = [...b].sort((x, y) => x - y);
	return left.length === right.length && left.every((v, i) => v === right[i]);
}

function sameId(a: ManufacturerId, b: ManufacturerId): boolean {
	return a.bank === b.bank && a.code === b.code;
}

function sameDate(a: ManufacturingDate | null, b: ManufacturingDate | null): boolean {
	if (a === null || b === null) {
		return a === b;
	}
	return a.year === b.year && a.week === b.week;
}

function hex2(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, "0");
}

function hex4(value: number): string {
	return value.toString(16).toUpperCase().padStart(4, "0");
}
