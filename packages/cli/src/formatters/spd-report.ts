/**
 * Report rendering for `spd info`.
 *
 * Layout:
 *   ---
 *   <module metadata as YAML, fields that did not decode left out>
 *   ---
 *
 *   ## Timings
 *   | Parameter | ns | Cycles |
 *
 *   ## XMP profiles            (only when an XMP block is present)
 *   | Profile | Data rate | Voltage | tCK (ns) | Timings | CRC |
 */

import {
	DDR4_TIMING_NAMES,
	type Ddr4Record,
	type DieInfo,
	type XmpBlock,
	type XmpProfile,
	clockCycles,
	describeDie,
} from "@spdkit/core";
import yaml from "js-yaml";
import { buildMarkdownTable } from "./markdown.js";

export interface SpdReportInput {
	/** File path or device name the image came from */
	source: string;
	record: Ddr4Record;
	xmp: XmpBlock;
	die: DieInfo | undefined;
}

const CLOCK_TIMINGS = new Set(["tCKmin", "tCKmax"]);

/**
 * Module metadata for the YAML block, in display order. Fields that did
 * not decode are `null`.
 */
export function buildInfoMetadata(input: SpdReportInput): Record<string, unknown> {
	const { record, xmp } = input;
	const density = record.density;
	const date = record.manufacturingDate;

	return {
		source: input.source,
		device_type: record.valid ? "DDR4" : `0x${hex2(record.deviceType)}`,
		module_type: record.moduleType.name,
		capacity: density ? formatCapacity(density.totalMiB) : null,
		organization: density ? `${density.packageRanks}Rx${density.sdramWidth}` : null,
		ecc: density ? density.eccBits > 0 : null,
		speed: record.speedGrade === null ? null : `DDR4-${record.speedGrade}`,
		timings: record.timingString,
		manufacturer: record.manufacturer.name,
		dram_manufacturer: record.dramManufacturer.name,
		part_number: record.partNumber,
		serial_number: record.serialNumber,
		manufactured: date ? `${date.year}-W${String(date.week).padStart(2, "0")}` : null,
		die: density ? describeDie(density.capacityMbit, input.die) : null,
		spd_revision: `${record.spdRevision >> 4}.${record.spdRevision & 0x0f}`,
		checksums: {
			base: record.checksums.base.valid ? "ok" : "mismatch",
			module: record.checksums.module.valid ? "ok" : "mismatch",
		},
		xmp: xmp.present && xmp.revision ? `${xmp.revision.major}.${xmp.revision.minor}` : null,
		issues: record.issues.map((issue) => issue.message),
	};
}

/**
 * Base timings with their clock-cycle equivalent at tCKmin.
 * Empty string when the timebase is reserved and nothing decoded.
 */
export function buildTimingTable(record: Ddr4Record): string {
	const timings = record.timings;
	if (!timings) {
		return "";
	}
	const rows = DDR4_TIMING_NAMES.map((name) => [
		name,
		formatNs(timings[name]),
		CLOCK_TIMINGS.has(name) ? "-" : String(clockCycles(timings[name], timings.tCKmin)),
	]);
	return buildMarkdownTable(["Parameter", "ns", "Cycles"], rows, ["left", "right", "right"]);
}

export function buildXmpTable(xmp: XmpBlock): string {
	const profiles = xmp.profiles.filter((p): p is XmpProfile => p !== null);
	if (!xmp.present || profiles.length === 0) {
		return "";
	}
	const rows = profiles.map((p) => [
		String(p.index),
		`DDR4-${p.dataRate}`,
		`${p.voltage.toFixed(2)} V`,
		formatNs(p.tCK),
		`${p.cycles.CL}-${p.cycles.tRCD}-${p.cycles.tRP}-${p.cycles.tRAS}`,
		p.checksumValid ? "ok" : "mismatch",
	]);
	return buildMarkdownTable(
		["Profile", "Data rate", "Voltage", "tCK (ns)", "Timings", "CRC"],
		rows,
		["left", "left", "right", "right", "left", "left"],
	);
}

/**
 * One-line description printed after a read.
 *
 * @example
 * summarizeRecord(record);
 * // => "HMA81GU6JJR8N-VK, SK Hynix, 8 GiB, DDR4-2400, CL17-17-17-38, CRC ok"
 */
export function summarizeRecord(record: Ddr4Record): string {
	const parts = [
		record.partNumber || "(no part number)",
		record.manufacturer.name,
		record.density ? formatCapacity(record.density.totalMiB) : null,
		record.speedGrade === null ? null : `DDR4-${record.speedGrade}`,
		record.timingString,
		record.checksumValid ? "CRC ok" : "CRC mismatch",
	];
	return parts.filter((part): part is string => part !== null).join(", ");
}

/**
 * Metadata as a YAML frontmatter block. Keys keep the order of
 * {@link buildInfoMetadata}; `null` fields are dropped.
 *
 * @example
 * formatInfoFrontmatter(input);
 * // => "---\nsource: dump.bin\ndevice_type: DDR4\n...---\n"
 */
export function formatInfoFrontmatter(input: SpdReportInput): string {
	const body = yaml.dump(buildInfoMetadata(input), {
		indent: 2,
		lineWidth: 120,
		noRefs: true,
		sortKeys: false,
		skipInvalid: true,
		replacer: (_key, value: unknown) => (value === null ? undefined : value),
	});
	return `---\n${body}---\n`;
}

/** Full `info` report: YAML frontmatter plus markdown tables */
export function formatInfoReport(input: SpdReportInput): string {
	const sections = [formatInfoFrontmatter(input)];

	const timings = buildTimingTable(input.record);
	if (timings) {
		sections.push(`## Timings\n\n${timings}\n`);
	}
	const xmp = buildXmpTable(input.xmp);
	if (xmp) {
		sections.push(`## XMP profiles\n\n${xmp}\n`);
	}
	return sections.join("\n");
}

/** `info --format json`: the decoded structures as they are */
export function formatInfoJson(input: SpdReportInput): string {
	return JSON.stringify(
		{ source: input.source, ddr4: input.record, xmp: input.xmp, die: input.die ?? null },
		null,
		2,
	);
}

/**
 * @example
 * formatNs(0.8330000001); // => "0.833"
 */
export function formatNs(ns: number): string {
	return String(Number(ns.toFixed(3)));
}

/**
 * @example
 * formatCapacity(8192); // => "8 GiB"
 */
export function formatCapacity(mib: number): string {
	return mib >= 1024 ? `${mib / 1024} GiB` : `${mib} MiB`;
}

function hex2(value: number): string {
	return value.toString(16).toUpperCase().padStart(2, "0");
}
