import { decodeDdr4, decodeXmp, inferDieType } from "@spdkit/core";
import { describe, expect, it } from "vitest";
import { createSampleDdr4Image, createSampleXmpImage } from "../../core/test/fixtures/sample-spd";
import { formatDiffReport, formatDifferences } from "../src/formatters/diff-formatter.js";
import { buildMarkdownTable } from "../src/formatters/markdown.js";
import {
	type SpdReportInput,
	buildInfoMetadata,
	buildTimingTable,
	buildXmpTable,
	formatCapacity,
	formatInfoFrontmatter,
	formatInfoJson,
	formatInfoReport,
	formatNs,
	summarizeRecord,
} from "../src/formatters/spd-report.js";

function reportInput(image: Uint8Array): SpdReportInput {
	const record = decodeDdr4(image);
	return {
		source: "sample.bin",
		record,
		xmp: decodeXmp(image),
		die: inferDieType(record.partNumber, record.manufacturer.name),
	};
}

describe("buildMarkdownTable", () => {
	it("pads columns and right-aligns numbers", () => {
		const table = buildMarkdownTable(
			["Parameter", "ns"],
			[
				["tAA", "13.75"],
				["tRFC1", "350"],
			],
			["left", "right"],
		);

		expect(table.split("\n")).toEqual([
			"| Parameter |    ns |",
			"| --------- | ----: |",
			"| tAA       | 13.75 |",
			"| tRFC1     |   350 |",
		]);
	});
});

describe("diff formatting", () => {
	const differences = [
		{ offset: 0x18, before: 0x6e, after: 0x6c },
		{ offset: 0x17e, before: 0x5a, after: 0x3c },
	];

	it("prints one line per byte", () => {
		expect(formatDifferences(differences)).toBe("0x018: 0x6E -> 0x6C\n0x17E: 0x5A -> 0x3C");
	});

	it("appends a count", () => {
		expect(formatDiffReport(differences)).toBe(
			"0x018: 0x6E -> 0x6C\n0x17E: 0x5A -> 0x3C\n2 bytes differ",
		);
		expect(formatDiffReport(differences.slice(0, 1))).toBe("0x018: 0x6E -> 0x6C\n1 byte differs");
	});

	it("reports identical images", () => {
		expect(formatDiffReport([])).toBe("Images are identical");
	});
});

describe("spd report", () => {
	it("collects module metadata", () => {
		expect(buildInfoMetadata(reportInput(createSampleDdr4Image()))).toEqual({
			source: "sample.bin",
			device_type: "DDR4",
			module_type: "UDIMM",
			capacity: "8 GiB",
			organization: "1Rx8",
			ecc: false,
			speed: "DDR4-2400",
			timings: "CL17-17-17-38",
			manufacturer: "SK Hynix",
			dram_manufacturer: "SK Hynix",
			part_number: "HMA81GU6JJR8N-VK",
			serial_number: "1234ABCD",
			manufactured: "2019-W23",
			die: "8 Gb",
			spd_revision: "1.1",
			checksums: { base: "ok", module: "ok" },
			xmp: null,
			issues: [],
		});
	});

	it("flags a checksum mismatch", () => {
		const image = createSampleDdr4Image({ fixChecksums: false });

		const metadata = buildInfoMetadata(reportInput(image));

		expect(metadata["checksums"]).toEqual({ base: "mismatch", module: "mismatch" });
	});

	it("renders timings with clock cycles at tCKmin", () => {
		const lines = buildTimingTable(decodeDdr4(createSampleDdr4Image())).split("\n");

		expect(lines).toHaveLength(2 + 14);
		expect(lines[0]).toBe("| Parameter |    ns | Cycles |");
		expect(lines[1]).toBe("| --------- | ----: | -----: |");
		expect(lines[2]).toBe("| tCKmin    | 0.833 |      - |");
		expect(lines[4]).toBe("| tAA       | 13.75 |     17 |");
		expect(lines[7]).toBe("| tRAS      |    32 |     38 |");
	});

	it("renders XMP profiles", () => {
		expect(buildXmpTable(decodeXmp(createSampleXmpImage())).split("\n")).toEqual([
			"| Profile | Data rate | Voltage | tCK (ns) | Timings     | CRC |",
			"| ------- | --------- | ------: | -------: | ----------- | --- |",
			"| 1       | DDR4-3200 |  1.35 V |    0.625 | 16-18-18-38 | ok  |",
		]);
	});

	it("omits the XMP table without an XMP block", () => {
		expect(buildXmpTable(decodeXmp(createSampleDdr4Image()))).toBe("");
	});

	it("puts YAML frontmatter before the tables", () => {
		const report = formatInfoReport(reportInput(createSampleXmpImage()));

		expect(report.startsWith("---\nsource: sample.bin\n")).toBe(true);
		expect(report).toContain("\npart_number: HMA81GU6JJR8N-VK\n");
		expect(report).toContain("\nchecksums:\n  base: ok\n  module: ok\n");
		expect(report).toContain("\n---\n\n## Timings\n\n| Parameter |");
		expect(report).toContain("\n## XMP profiles\n\n| Profile |");
	});

	it("leaves undecoded fields out of the frontmatter", () => {
		const frontmatter = formatInfoFrontmatter(reportInput(createSampleDdr4Image()));

		expect(frontmatter.startsWith("---\nsource: sample.bin\ndevice_type: DDR4\n")).toBe(true);
		expect(frontmatter.endsWith("\nissues: []\n---\n")).toBe(true);
		expect(frontmatter).not.toContain("xmp");
		expect(frontmatter).not.toContain("null");
	});

	it("emits parseable JSON", () => {
		const parsed: unknown = JSON.parse(formatInfoJson(reportInput(createSampleDdr4Image())));

		expect(parsed).toMatchObject({
			source: "sample.bin",
			ddr4: { partNumber: "HMA81GU6JJR8N-VK", speedGrade: 2400 },
			xmp: { present: false },
			die: null,
		});
	});

	it("summarizes a record on one line", () => {
		expect(summarizeRecord(decodeDdr4(createSampleDdr4Image()))).toBe(
			"HMA81GU6JJR8N-VK, SK Hynix, 8 GiB, DDR4-2400, CL17-17-17-38, CRC ok",
		);
	});

	it("formats numbers", () => {
		expect(formatNs(0.8330000001)).toBe("0.833");
		expect(formatNs(350)).toBe("350");
		expect(formatCapacity(512)).toBe("512 MiB");
		expect(formatCapacity(32768)).toBe("32 GiB");
	});
});
