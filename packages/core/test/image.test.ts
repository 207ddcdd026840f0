import { describe, expect, it } from "vitest";
import { InvalidImageSizeError } from "../src/errors";
import { assertRawImage, diffImages } from "../src/image";

describe("assertRawImage", () => {
	it("accepts exactly 512 bytes", () => {
		expect(() => assertRawImage(new Uint8Array(512))).not.toThrow();
	});

	it("rejects other sizes", () => {
		expect(() => assertRawImage(new Uint8Array(10))).toThrow(
			"SPD image must be exactly 512 bytes, got 10",
		);
	});
});

describe("diffImages", () => {
	it("lists differing offsets in order", () => {
		const before = new Uint8Array(512);
		const after = new Uint8Array(512);
		after[320] = 0x01;
		after[3] = 0x02;

		expect(diffImages(before, after)).toEqual([
			{ offset: 3, before: 0, after: 0x02 },
			{ offset: 320, before: 0, after: 0x01 },
		]);
	});

	it("returns nothing for identical images", () => {
		expect(diffImages(new Uint8Array(512), new Uint8Array(512))).toEqual([]);
	});

	it("rejects images of different lengths", () => {
		expect(() => diffImages(new Uint8Array(512), new Uint8Array(256))).toThrow(
			InvalidImageSizeError,
		);
	});
});
