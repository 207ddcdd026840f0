import { FieldRangeError } from "./errors";
import { type ByteDifference, SPD_SIZE, assertRawImage, diffImages } from "./image";
import { type DecodeOptions, type Ddr4Record, decodeDdr4 } from "./spd/ddr4";
import { type XmpBlock, decodeXmp } from "./spd/xmp";

/**
 * Event fired when document bytes change
 */
export interface SpdChangeEvent {
	readonly type: "byte" | "range" | "loaded" | "reset" | "confirmed";
	/**
	 * The offset where the change started, if known
	 */
	readonly offset?: number | undefined;
	/**
	 * The length of the changed data, if known
	 */
	readonly length?: number | undefined;
}

export type SpdSource =
	| { kind: "device"; deviceId: string }
	| { kind: "file"; path: string }
	| { kind: "memory" };

/**
 * An SPD image being edited, plus the backup it was loaded as.
 *
 * The backup is the image as read from the device or file. It stays
 * available (for diffing, per-byte reset, and the "original" page skip of
 * a device write) until {@link confirmOverwrite} is called after a
 * successful write or export.
 */
export class SpdDocument {
	private _image: Uint8Array;
	private _backup: Uint8Array;
	private _source: SpdSource;
	private readonly _modified = new Set<number>();
	private readonly _listeners = new Set<(event: SpdChangeEvent) => void>();

	/**
	 * @throws InvalidImageSizeError if the image is not 512 bytes
	 */
	constructor(image: Uint8Array, source: SpdSource = { kind: "memory" }) {
		assertRawImage(image);
		this._image = new Uint8Array(image);
		this._backup = new Uint8Array(image);
		this._source = source;
	}

	/** Copy of the current image */
	get image(): Uint8Array {
		return new Uint8Array(this._image);
	}

	/** Copy of the image as loaded */
	get backup(): Uint8Array {
		return new Uint8Array(this._backup);
	}

	get source(): SpdSource {
		return this._source;
	}

	get isDirty(): boolean {
		return this._modified.size > 0;
	}

	/** Offsets that currently differ from the backup, ascending */
	get modifiedOffsets(): number[] {
		return [...this._modified].sort((a, b) => a - b);
	}

	/**
	 * Subscribe to changes
	 * @returns Function that removes the listener
	 */
	onDidChange(listener: (event: SpdChangeEvent) => void): () => void {
		this._listeners.add(listener);
		return () => {
			this._listeners.delete(listener);
		};
	}

	getByte(offset: number): number {
		assertOffset(offset, 1);
		return this._image[offset] as number;
	}

	getOriginalByte(offset: number): number {
		assertOffset(offset, 1);
		return this._backup[offset] as number;
	}

	isByteModified(offset: number): boolean {
		return this._modified.has(offset);
	}

	/**
	 * @throws FieldRangeError if the offset or value is out of range
	 */
	setByte(offset: number, value: number): void {
		assertOffset(offset, 1);
		assertByte(value, offset);
		if (this._image[offset] === value) {
			return;
		}
		this.writeByte(offset, value);
		this.fire({ type: "byte", offset, length: 1 });
	}

	/**
	 * Set a run of bytes. Nothing is written unless every value is valid.
	 *
	 * @throws FieldRangeError if the range or a value is out of range
	 */
	setBytes(offset: number, values: ArrayLike<number>): void {
		assertOffset(offset, values.length);
		for (let i = 0; i < values.length; i++) {
			assertByte(values[i] as number, offset + i);
		}
		for (let i = 0; i < values.length; i++) {
			this.writeByte(offset + i, values[i] as number);
		}
		this.fire({ type: "range", offset, length: values.length });
	}

	/**
	 * Replace the current image (for example with the output of an encoder).
	 * The backup is kept, so the replaced bytes count as modifications.
	 */
	applyImage(image: Uint8Array): void {
		assertRawImage(image);
		this.setBytes(0, image);
	}

	/**
	 * Load a new image, replacing both the current image and the backup
	 */
	load(image: Uint8Array, source: SpdSource): void {
		assertRawImage(image);
		this._image = new Uint8Array(image);
		this._backup = new Uint8Array(image);
		this._source = source;
		this._modified.clear();
		this.fire({ type: "loaded" });
	}

	resetToOriginal(): void {
		this._image = new Uint8Array(this._backup);
		this._modified.clear();
		this.fire({ type: "reset" });
	}

	resetByte(offset: number): void {
		this.setByte(offset, this.getOriginalByte(offset));
	}

	/** Every byte that differs from the backup */
	getModifications(): ByteDifference[] {
		return diffImages(this._backup, this._image);
	}

	/**
	 * Drop the backup: the current image becomes the new original.
	 * Call only after the image was written to the device or exported.
	 */
	confirmOverwrite(): void {
		this._backup = new Uint8Array(this._image);
		this._modified.clear();
		this.fire({ type: "confirmed" });
	}

	decode(options?: DecodeOptions): { ddr4: Ddr4Record; xmp: XmpBlock } {
		return { ddr4: decodeDdr4(this._image, options), xmp: decodeXmp(this._image) };
	}

	private writeByte(offset: number, value: number): void {
		this._image[offset] = value;
		if (this._backup[offset] === value) {
			this._modified.delete(offset);
		} else {
			this._modified.add(offset);
		}
	}

	private fire(event: SpdChangeEvent): void {
		for (const listener of this._listeners) {
			listener(event);
		}
	}
}

function assertOffset(offset: number, length: number): void {
	if (!Number.isInteger(offset) || offset < 0 || offset + length > SPD_SIZE) {
		throw new FieldRangeError(
			"offset",
			offset,
			`Offset ${offset} (length ${length}) is outside the ${SPD_SIZE}-byte image`,
		);
	}
}

function assertByte(value: number, offset: number): void {
	if (!Number.isInteger(value) || value < 0 || value > 0xff) {
		throw new FieldRangeError(
			"byte",
			value,
			`Value ${value} at offset ${offset} is not a byte`,
		);
	}
}
