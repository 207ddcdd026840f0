import { describe, expect, it } from "vitest";
import { ChecksumMismatchError } from "../src/errors";
import {
	assertChecksumsValid,
	findChecksumMismatches,
	imageChecksums,
	recomputeAllChecksums,
} from "../src/spd/checksums";
import { createSampleDdr4Image, createSampleXmpImage, u16At } from "./fixtures/sample-spd";

describe("imageChecksums", () => {
	it("lists the base and module CRCs of a plain image", () => {
		expect(imageChecksums(createSampleDdr4Image()).map((c) => c.name)).toEqual(["base", "module"]);
	});

	it("adds one CRC per enabled XMP profile", () => {
		expect(imageChecksums(createSampleXmpImage([1, 2])).map((c) => c.name)).toEqual([
			"base",
			"module",
			"xmp.profile1",
			"xmp.profile2",
		]);
	});
});

describe("findChecksumMismatches", () => {
	it("finds nothing in a consistent image", () => {
		expect(findChecksumMismatches(createSampleXmpImage())).toEqual([]);
	});

	it("reports each stale CRC with stored and computed values", () => {
		const image = createSampleDdr4Image();
		const stored = u16At(image, 126);
		image[0x12] = 0x06;

		const mismatches = findChecksumMismatches(image);

		expect(mismatches).toHaveLength(1);
		expect(mismatches[0]).toBeInstanceOf(ChecksumMismatchError);
		expect(mismatches[0]).toMatchObject({ code: "ChecksumMismatch", region: "base", stored });
		expect(mismatches[0]?.computed).not.toBe(stored);
	});

	it("checks enabled XMP profiles", () => {
		const image = createSampleXmpImage();
		image[0x18a] = (image[0x18a] as number) ^ 0x01;

		expect(findChecksumMismatches(image).map((m) => m.region)).toEqual(["xmp.profile1"]);
	});
});

describe("assertChecksumsValid", () => {
	it("throws the first mismatch", () => {
		const image = createSampleDdr4Image({ fixChecksums: false });

		expect(() => assertChecksumsValid(image)).toThrow(ChecksumMismatchError);
		expect(() => assertChecksumsValid(image)).toThrow(/^base checksum mismatch: stored 0x0000/);
	});

	it("accepts a consistent image", () => {
		expect(() => assertChecksumsValid(createSampleXmpImage([1, 2]))).not.toThrow();
	});
});

describe("recomputeAllChecksums", () => {
	it("fixes every stale CRC and leaves the input alone", () => {
		const image = createSampleXmpImage();
		image[0x12] = 0x06;
		image[0x18a] = (image[0x18a] as number) ^ 0x01;
		const copy = new Uint8Array(image);

		const fixed = recomputeAllChecksums(image);

		expect(findChecksumMismatches(fixed)).toEqual([]);
		expect(image).toEqual(copy);
		expect(fixed[0x12]).toBe(0x06);
	});
});
