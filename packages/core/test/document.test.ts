import { describe, expect, it, vi } from "vitest";
import { SpdDocument, type SpdChangeEvent } from "../src/document";
import { FieldRangeError, InvalidImageSizeError } from "../src/errors";
import { decodeDdr4, encodeDdr4 } from "../src/spd/ddr4";
import { createSampleDdr4Image, createSampleXmpImage } from "./fixtures/sample-spd";

describe("SpdDocument", () => {
	it("rejects images that are not 512 bytes", () => {
		expect(() => new SpdDocument(new Uint8Array(100))).toThrow(InvalidImageSizeError);
	});

	it("copies the image it was given", () => {
		const image = createSampleDdr4Image();
		const doc = new SpdDocument(image);
		image[0] = 0xff;
		expect(doc.getByte(0)).toBe(0x23);

		const view = doc.image;
		view[0] = 0xff;
		expect(doc.getByte(0)).toBe(0x23);
	});

	it("tracks modified bytes against the backup", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		expect(doc.isDirty).toBe(false);

		doc.setByte(322, 0x02);
		expect(doc.isDirty).toBe(true);
		expect(doc.isByteModified(322)).toBe(true);
		expect(doc.getOriginalByte(322)).toBe(0x01);
		expect(doc.modifiedOffsets).toEqual([322]);

		doc.setByte(322, 0x01);
		expect(doc.isDirty).toBe(false);
	});

	it("fires change events and supports unsubscribe", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		const events: SpdChangeEvent[] = [];
		const unsubscribe = doc.onDidChange((event) => events.push(event));

		doc.setByte(10, 0x55);
		doc.setByte(10, 0x55);
		doc.setBytes(20, [1, 2, 3]);
		unsubscribe();
		doc.setByte(11, 0x66);

		expect(events).toEqual([
			{ type: "byte", offset: 10, length: 1 },
			{ type: "range", offset: 20, length: 3 },
		]);
	});

	it("writes nothing when one value in a run is invalid", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		expect(() => doc.setBytes(10, [1, 256])).toThrow(
			new FieldRangeError("byte", 256, "Value 256 at offset 11 is not a byte"),
		);
		expect(doc.isDirty).toBe(false);
	});

	it("rejects offsets outside the image", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		expect(() => doc.getByte(512)).toThrow("Offset 512 (length 1) is outside the 512-byte image");
		expect(() => doc.setBytes(510, [0, 0, 0])).toThrow(
			"Offset 510 (length 3) is outside the 512-byte image",
		);
	});

	it("applies an encoded image as modifications", () => {
		const original = createSampleDdr4Image();
		const doc = new SpdDocument(original, { kind: "file", path: "module.bin" });
		const record = doc.decode().ddr4;
		record.partNumber = "TEST-PART";

		doc.applyImage(encodeDdr4(record, original));

		expect(doc.decode().ddr4.partNumber).toBe("TEST-PART");
		expect(doc.getModifications().every((d) => d.offset >= 329 && d.offset < 349)).toBe(true);
		expect(doc.backup).toEqual(original);
	});

	it("resets single bytes and the whole image", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		const listener = vi.fn();
		doc.onDidChange(listener);

		doc.setBytes(0, [0, 0]);
		doc.resetByte(0);
		expect(doc.modifiedOffsets).toEqual([1]);

		doc.resetToOriginal();
		expect(doc.isDirty).toBe(false);
		expect(doc.getByte(1)).toBe(0x11);
		expect(listener).toHaveBeenLastCalledWith({ type: "reset" });
	});

	it("makes the current image the backup on confirmOverwrite", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		doc.setByte(322, 0x09);
		doc.confirmOverwrite();

		expect(doc.isDirty).toBe(false);
		expect(doc.getOriginalByte(322)).toBe(0x09);
	});

	it("loads a new image and source", () => {
		const doc = new SpdDocument(createSampleDdr4Image());
		doc.setByte(0, 0);
		doc.load(createSampleXmpImage(), { kind: "device", deviceId: "hid:test" });

		expect(doc.isDirty).toBe(false);
		expect(doc.source).toEqual({ kind: "device", deviceId: "hid:test" });
		expect(doc.decode().xmp.present).toBe(true);
	});

	it("decodes the current image", () => {
		const image = createSampleDdr4Image();
		const doc = new SpdDocument(image);
		expect(doc.decode().ddr4).toEqual(decodeDdr4(image));
		expect(doc.decode().xmp.present).toBe(false);
	});
});
