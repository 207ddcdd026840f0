/**
 * `--set field=value` and `--byte offset=value` edits.
 *
 * Field edits go through the DDR4 and XMP encoders, so checksums covering
 * an edited field are recomputed. Raw byte edits do not touch checksums.
 *
 * Field names:
 * - partNumber, serialNumber, moduleType, moduleRevision, dramStepping,
 *   manufacturingLocation, casLatencies (comma list)
 * - manufacturer, dramManufacturer (JEP106 name or `bank:code`)
 * - manufacturingDate (`2021-W05` or `none`)
 * - tCKmin, tAA, tRCD, ... (ns)
 * - density.capacityMbit, density.dieCount, ... , density.nonMonolithic
 * - xmp.present, xmp1.voltage, xmp1.tCK, xmp1.tAA, xmp1.enabled,
 *   xmp1.dimmsPerChannel, xmp1.casLatencies (same for xmp2)
 */

import {
	DDR4_TIMING_NAMES,
	type Ddr4Record,
	type ManufacturerId,
	type ManufacturerLookup,
	type ManufacturingDate,
	XMP_TIMING_NAMES,
	type XmpBlock,
	type XmpProfileIndex,
	createXmpProfile,
	decodeDdr4,
	decodeXmp,
	defaultManufacturerLookup,
	encodeDdr4,
	encodeXmp,
} from "@spdkit/core";
import { UsageError, splitAssignment } from "./args.js";

const DENSITY_NUMBERS = [
	"capacityMbit",
	"bankGroups",
	"banksPerGroup",
	"rowBits",
	"columnBits",
	"signalLoading",
	"dieCount",
	"sdramWidth",
	"packageRanks",
	"busWidth",
	"eccBits",
] as const;

const RECORD_INTEGERS = ["manufacturingLocation", "moduleRevision", "dramStepping"] as const;

export interface FieldEditOptions {
	manufacturers?: ManufacturerLookup;
}

/**
 * Apply `field=value` assignments to an image.
 *
 * @returns a new image; the input is not modified
 * @throws UsageError for an unknown field or an unparseable value
 * @throws FieldRangeError if a value does not fit its field
 *
 * @example
 * applyFieldEdits(image, ["tAA=13.5", "xmp1.voltage=1.4"]);
 */
export function applyFieldEdits(
	image: Uint8Array,
	assignments: readonly string[],
	options: FieldEditOptions = {},
): Uint8Array {
	const lookup = options.manufacturers ?? defaultManufacturerLookup;
	const record = decodeDdr4(image, { manufacturers: lookup });
	const xmp = decodeXmp(image);
	let ddr4Edited = false;
	let xmpEdited = false;

	for (const assignment of assignments) {
		const [key, value] = splitAssignment(assignment, "set");
		if (key.startsWith("xmp")) {
			applyXmpEdit(xmp, key, value);
			xmpEdited = true;
		} else {
			applyDdr4Edit(record, key, value, lookup);
			ddr4Edited = true;
		}
	}

	let result = ddr4Edited ? encodeDdr4(record, image) : new Uint8Array(image);
	if (xmpEdited) {
		result = encodeXmp(xmp, result);
	}
	return result;
}

/**
 * Parse `offset=value`; both sides accept decimal or `0x` hex.
 *
 * @example
 * parseByteAssignment("0x140=0x80"); // => [320, 128]
 */
export function parseByteAssignment(assignment: string): [number, number] {
	const [offset, value] = splitAssignment(assignment, "byte");
	return [parseInteger(offset, "byte offset"), parseInteger(value, `byte ${offset}`)];
}

function applyDdr4Edit(
	record: Ddr4Record,
	key: string,
	value: string,
	lookup: ManufacturerLookup,
): void {
	switch (key) {
		case "partNumber":
			record.partNumber = value;
			return;
		case "serialNumber":
			record.serialNumber = value;
			return;
		case "manufacturer":
		case "dramManufacturer":
			record[key] = parseManufacturer(value, key, lookup);
			return;
		case "manufacturingDate":
			record.manufacturingDate = parseDate(value, key);
			return;
		case "moduleType":
			record.moduleType = { code: parseInteger(value, key), name: "" };
			return;
		case "casLatencies":
			record.casLatencies = parseList(value, key);
			return;
	}

	const integer = RECORD_INTEGERS.find((name) => name === key);
	if (integer) {
		record[integer] = parseInteger(value, key);
		return;
	}

	const timing = DDR4_TIMING_NAMES.find((name) => name === key);
	if (timing) {
		if (!record.timings) {
			throw new UsageError(`${key}: timings cannot be edited while the timebase byte is reserved`);
		}
		record.timings[timing] = parseNumber(value, key);
		return;
	}

	if (key.startsWith("density.")) {
		const density = record.density;
		if (!density) {
			throw new UsageError(`${key}: density cannot be edited while bytes 4-13 hold reserved codes`);
		}
		const sub = key.slice("density.".length);
		if (sub === "nonMonolithic") {
			density.nonMonolithic = parseBoolean(value, key);
			return;
		}
		const field = DENSITY_NUMBERS.find((name) => name === sub);
		if (field) {
			density[field] = parseInteger(value, key);
			return;
		}
	}

	throw new UsageError(`Unknown field "${key}"`);
}

function applyXmpEdit(block: XmpBlock, key: string, value: string): void {
	if (key === "xmp.present") {
		block.present = parseBoolean(value, key);
		return;
	}

	const match = /^xmp([12])\.(\w+)$/.exec(key);
	if (!match) {
		throw new UsageError(`Unknown field "${key}"`);
	}
	const index: XmpProfileIndex = match[1] === "1" ? 1 : 2;
	const slot = index - 1;
	const field = match[2] ?? "";

	// A disabled or missing profile starts over from the defaults
	const profile = block.profiles[slot] ?? createXmpProfile(index);
	block.profiles[slot] = profile;
	block.present = true;

	switch (field) {
		case "enabled":
			profile.enabled = parseBoolean(value, key);
			return;
		case "voltage":
			profile.voltage = parseNumber(value, key);
			return;
		case "tCK":
			profile.tCK = parseNumber(value, key);
			return;
		case "dimmsPerChannel":
			profile.dimmsPerChannel = parseInteger(value, key);
			return;
		case "casLatencies":
			profile.casLatencies = parseList(value, key);
			return;
	}

	const timing = XMP_TIMING_NAMES.find((name) => name === field);
	if (!timing) {
		throw new UsageError(`Unknown field "${key}"`);
	}
	profile.timings[timing] = parseNumber(value, key);
}

function parseManufacturer(
	value: string,
	key: string,
	lookup: ManufacturerLookup,
): ManufacturerId {
	const pair = /^(\d+):(0x[0-9a-f]{1,2}|\d{1,3})$/i.exec(value);
	if (pair) {
		return {
			bank: parseInteger(pair[1] ?? "", key),
			code: parseInteger(pair[2] ?? "", key),
			name: "",
		};
	}
	const id = lookup.resolveId?.(value);
	if (!id) {
		throw new UsageError(`${key}: unknown manufacturer "${value}"; use a JEP106 name or bank:code`);
	}
	return { ...id, name: value };
}

function parseDate(value: string, key: string): ManufacturingDate | null {
	if (value.toLowerCase() === "none") {
		return null;
	}
	const match = /^(\d{4})-W?(\d{1,2})$/i.exec(value);
	if (!match) {
		throw new UsageError(`${key}: "${value}" is not a date like 2021-W05`);
	}
	return { year: Number(match[1]), week: Number(match[2]) };
}

function parseNumber(value: string, key: string): number {
	const n = Number(value);
	if (value.trim() === "" || !Number.isFinite(n)) {
		throw new UsageError(`${key}: "${value}" is not a number`);
	}
	return n;
}

function parseInteger(value: string, key: string): number {
	const n = parseNumber(value, key);
	if (!Number.isInteger(n)) {
		throw new UsageError(`${key}: "${value}" is not an integer`);
	}
	return n;
}

function parseBoolean(value: string, key: string): boolean {
	switch (value.toLowerCase()) {
		case "true":
		case "yes":
		case "1":
			return true;
		case "false":
		case "no":
		case "0":
			return false;
	}
	throw new UsageError(`${key}: "${value}" is not true or false`);
}

function parseList(value: string, key: string): number[] {
	if (value.trim() === "") {
		return [];
	}
	return value.split(",").map((item) => parseInteger(item.trim(), key));
}
