import {
	PAGE_COUNT,
	PAGE_SIZE,
	ReadFaultError,
	SPD_SIZE,
	WriteVerificationFailedError,
	assertRawImage,
	diffImages,
} from "@spdkit/core";
import {
	type DeviceConnection,
	type DeviceLogger,
	type ReadOptions,
	type SpdProtocol,
	type TransferPhase,
	type TransferProgress,
	type VerifyResult,
	type WriteOptions,
	computeChangedPages,
	delay,
	throwIfCancelled,
	transferProgress,
} from "@spdkit/device";
import {
	CHUNK_SIZE,
	PAGE_SELECT_COMMANDS,
	SPD_I2C_ADDRESS,
	WAKE_COMMAND,
	decodeReply,
	encodeCommand,
	parseReadReply,
	readChunkCommand,
	writeChunkCommand,
} from "./commands.js";

export * from "./commands.js";

/** Delays in milliseconds */
export interface BtI2cTiming {
	/** After the wake command */
	wakeDelayMs: number;
	/** After selecting page 0 and page 1; page 1 needs longer to settle */
	pageSelectDelayMs: readonly [number, number];
	/** Before retrying a chunk whose reply was malformed */
	retryDelayMs: number;
	/** After each write command, while the EEPROM commits the chunk */
	writeSettleMs: number;
}

export const DEFAULT_TIMING: BtI2cTiming = {
	wakeDelayMs: 100,
	pageSelectDelayMs: [200, 400],
	retryDelayMs: 50,
	writeSettleMs: 80,
};

export interface BtI2cProtocolOptions {
	/** I2C address of the SPD EEPROM @default 0x50 */
	address?: number;
	timing?: Partial<BtI2cTiming>;
	/** Attempts per chunk before the read fails @default 3 */
	chunkAttempts?: number;
	/**
	 * Extra reads of a page that came back all zeros. An all-zero page is
	 * usually a module that is not seated properly. @default 2
	 */
	zeroPageRetries?: number;
	/** Accept a page that is still all zeros after the retries @default false */
	allowBlankPages?: boolean;
	/** Read timeout passed to the connection for every command @default 1000 */
	responseTimeoutMs?: number;
}

interface TransferContext {
	phase: TransferPhase;
	totalBytes: number;
	/** Bytes already reported before this page */
	baseBytes: number;
	onProgress: ((progress: TransferProgress) => void) | undefined;
	signal: AbortSignal | undefined;
	logger: DeviceLogger | undefined;
}

/**
 * BT-I2C protocol for CH341-style DDR4 SPD programmers.
 *
 * The bridge reaches the EEPROM over I2C. DDR4 SPD EEPROMs (EE1004) expose
 * 256 bytes at a time, so every transfer selects page 0 or page 1 first
 * and then moves 8-byte chunks addressed within that page.
 *
 * Reads retry malformed chunks and re-read pages that come back all zeros.
 * Writes are never retried: every written page is read back and the first
 * mismatch is reported with its absolute offset.
 */
export class BtI2cProtocol implements SpdProtocol {
	readonly name = "BT-I2C (EE1004)";

	private readonly address: number;
	private readonly timing: BtI2cTiming;
	private readonly chunkAttempts: number;
	private readonly zeroPageRetries: number;
	private readonly allowBlankPages: boolean;
	private readonly responseTimeoutMs: number;

	constructor(options: BtI2cProtocolOptions = {}) {
		this.address = options.address ?? SPD_I2C_ADDRESS;
		this.timing = { ...DEFAULT_TIMING, ...options.timing };
		this.chunkAttempts = Math.max(1, options.chunkAttempts ?? 3);
		this.zeroPageRetries = Math.max(0, options.zeroPageRetries ?? 2);
		this.allowBlankPages = options.allowBlankPages ?? false;
		this.responseTimeoutMs = options.responseTimeoutMs ?? 1000;
	}

	/**
	 * Read the full image: wake, then page 0 and page 1 in order.
	 *
	 * @throws ReadFaultError if a chunk never yields a valid reply, or a page
	 *   stays all zeros after the retries (unless blank pages are allowed)
	 * @throws TransferCancelledError if the signal fires between chunks
	 */
	async readSpd(connection: DeviceConnection, options: ReadOptions = {}): Promise<Uint8Array> {
		return this.readImage(connection, options, "reading");
	}

	/**
	 * Write an image. Pages identical to `options.originalImage` are skipped.
	 *
	 * Sequence per page:
	 * 1. Select the page
	 * 2. Write 32 chunks of 8 bytes
	 * 3. Read the page back and compare
	 *
	 * @throws WriteVerificationFailedError at the first byte that reads back
	 *   differently (write-protected block, bad contact)
	 * @throws TransferCancelledError if the signal fires between chunks
	 */
	async writeSpd(
		connection: DeviceConnection,
		image: Uint8Array,
		options: WriteOptions = {},
	): Promise<void> {
		assertRawImage(image);
		const { onProgress, signal, logger, originalImage } = options;

		const pages = originalImage
			? computeChangedPages(originalImage, image)
			: Array.from({ length: PAGE_COUNT }, (_, i) => i);

		if (pages.length === 0) {
			logger?.info("No page differs from the original image; nothing written");
			return;
		}
		if (pages.length < PAGE_COUNT) {
			logger?.info(`Writing page ${pages.join(", ")} only`, { pages });
		}

		const totalBytes = pages.length * PAGE_SIZE;
		await this.wake(connection, logger);

		for (const [index, page] of pages.entries()) {
			const baseBytes = index * PAGE_SIZE;
			const expected = image.subarray(page * PAGE_SIZE, (page + 1) * PAGE_SIZE);

			await this.selectPage(connection, page, logger);
			await this.writePage(connection, page, expected, {
				phase: "writing",
				totalBytes,
				baseBytes,
				onProgress,
				signal,
				logger,
			});

			const actual = await this.readPageChunks(connection, page, {
				phase: "verifying",
				totalBytes,
				baseBytes,
				onProgress,
				signal,
				logger,
			});

			const mismatch = expected.findIndex((byte, i) => actual[i] !== byte);
			if (mismatch !== -1) {
				const offset = page * PAGE_SIZE + mismatch;
				logger?.warn("Verification failed", { page, offset });
				throw new WriteVerificationFailedError(
					offset,
					expected[mismatch] as number,
					actual[mismatch] as number,
				);
			}
			logger?.info(`Page ${page} written and verified`, { page });
		}
	}

	/** Read the module and list every byte that differs from `image` */
	async verifySpd(
		connection: DeviceConnection,
		image: Uint8Array,
		options: ReadOptions = {},
	): Promise<VerifyResult> {
		assertRawImage(image);
		const actual = await this.readImage(connection, options, "verifying");
		const differences = diffImages(image, actual);
		options.logger?.info(
			differences.length === 0
				? "Module matches the image"
				: `Module differs from the image at ${differences.length} offsets`,
		);
		return { matches: differences.length === 0, differences };
	}

	private async readImage(
		connection: DeviceConnection,
		options: ReadOptions,
		phase: TransferPhase,
	): Promise<Uint8Array> {
		const { onProgress, signal, logger } = options;
		const image = new Uint8Array(SPD_SIZE);

		await this.wake(connection, logger);

		for (let page = 0; page < PAGE_COUNT; page++) {
			const data = await this.readPage(connection, page, {
				phase,
				totalBytes: SPD_SIZE,
				baseBytes: page * PAGE_SIZE,
				onProgress,
				signal,
				logger,
			});
			image.set(data, page * PAGE_SIZE);
		}

		return image;
	}

	/**
	 * Select and read one page, re-reading it while it comes back all zeros.
	 */
	private async readPage(
		connection: DeviceConnection,
		page: number,
		ctx: TransferContext,
	): Promise<Uint8Array> {
		const attempts = this.zeroPageRetries + 1;

		for (let attempt = 1; ; attempt++) {
			await this.selectPage(connection, page, ctx.logger);
			const data = await this.readPageChunks(connection, page, ctx);

			if (data.some((byte) => byte !== 0)) {
				return data;
			}
			if (attempt < attempts) {
				ctx.logger?.warn(`Page ${page} read back as all zeros; retrying`, {
					page,
					attempt,
				});
				continue;
			}
			if (this.allowBlankPages) {
				ctx.logger?.warn(`Page ${page} is blank; accepting it`, { page });
				return data;
			}
			throw new ReadFaultError(
				`Page ${page} read back as all zeros ${attempts} times; check that the module is seated`,
				{ page, attempts },
			);
		}
	}

	private async readPageChunks(
		connection: DeviceConnection,
		page: number,
		ctx: TransferContext,
	): Promise<Uint8Array> {
		const data = new Uint8Array(PAGE_SIZE);

		for (let offset = 0; offset < PAGE_SIZE; offset += CHUNK_SIZE) {
			throwIfCancelled(ctx.signal, ctx.baseBytes + offset);

			const chunk = await this.readChunk(connection, page, offset, ctx.logger);
			data.set(chunk, offset);

			ctx.onProgress?.(
				transferProgress(
					ctx.phase,
					ctx.baseBytes + offset + CHUNK_SIZE,
					ctx.totalBytes,
					page,
				),
			);
		}

		return data;
	}

	private async readChunk(
		connection: DeviceConnection,
		page: number,
		offset: number,
		logger: DeviceLogger | undefined,
	): Promise<Uint8Array> {
		const command = readChunkCommand(this.address, offset);

		for (let attempt = 1; attempt <= this.chunkAttempts; attempt++) {
			const chunk = parseReadReply(await this.send(connection, command));
			if (chunk) {
				return chunk;
			}
			if (attempt < this.chunkAttempts) {
				logger?.debug("Malformed read reply; retrying", {
					page,
					offset,
					attempt,
				});
				await delay(this.timing.retryDelayMs);
			}
		}

		const absolute = page * PAGE_SIZE + offset;
		throw new ReadFaultError(
			`No valid reply reading offset 0x${absolute.toString(16).toUpperCase().padStart(3, "0")} after ${this.chunkAttempts} attempts`,
			{ page, offset: absolute, attempts: this.chunkAttempts },
		);
	}

	private async writePage(
		connection: DeviceConnection,
		page: number,
		data: Uint8Array,
		ctx: TransferContext,
	): Promise<void> {
		for (let offset = 0; offset < PAGE_SIZE; offset += CHUNK_SIZE) {
			throwIfCancelled(ctx.signal, ctx.baseBytes + offset);

			const chunk = data.subarray(offset, offset + CHUNK_SIZE);
			await this.send(connection, writeChunkCommand(this.address, offset, chunk));
			await delay(this.timing.writeSettleMs);

			ctx.onProgress?.(
				transferProgress(
					ctx.phase,
					ctx.baseBytes + offset + CHUNK_SIZE,
					ctx.totalBytes,
					page,
				),
			);
		}
	}

	private async wake(
		connection: DeviceConnection,
		logger: DeviceLogger | undefined,
	): Promise<void> {
		const reply = await this.send(connection, WAKE_COMMAND);
		logger?.debug("Programmer awake", { reply });
		await delay(this.timing.wakeDelayMs);
	}

	private async selectPage(
		connection: DeviceConnection,
		page: number,
		logger: DeviceLogger | undefined,
	): Promise<void> {
		const command = PAGE_SELECT_COMMANDS[page];
		if (command === undefined) {
			throw new RangeError(`Page ${page} does not exist`);
		}
		logger?.debug(`Selecting page ${page}`, { page });
		await this.send(connection, command);
		await delay(this.timing.pageSelectDelayMs[page] ?? 0);
	}

	private async send(connection: DeviceConnection, command: string): Promise<string> {
		const frame = await connection.sendFrame(encodeCommand(command), this.responseTimeoutMs);
		return decodeReply(frame);
	}
}
