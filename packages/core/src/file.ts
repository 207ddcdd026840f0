import { readFile, writeFile } from "node:fs/promises";
import { InvalidFileSizeError } from "./errors";
import { SPD_SIZE, assertRawImage } from "./image";

/**
 * Read a raw `.bin` SPD dump. The file holds the 512 image bytes and
 * nothing else.
 *
 * @throws InvalidFileSizeError if the file is not exactly 512 bytes
 */
export async function readSpdFile(path: string): Promise<Uint8Array> {
	const contents = await readFile(path);
	if (contents.length !== SPD_SIZE) {
		throw new InvalidFileSizeError(path, contents.length, SPD_SIZE);
	}
	return new Uint8Array(contents);
}

/**
 * Write an image as a raw `.bin` dump.
 *
 * @throws InvalidImageSizeError if the image is not 512 bytes
 */
export async function writeSpdFile(path: string, image: Uint8Array): Promise<void> {
	assertRawImage(image);
	await writeFile(path, image);
}
