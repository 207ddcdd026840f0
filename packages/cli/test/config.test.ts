import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";

vi.mock("node-hid", () => ({ devicesAsync: vi.fn(), HIDAsync: { open: vi.fn() } }));

describe("loadConfig", () => {
	let cwd: string;

	beforeEach(async () => {
		cwd = await mkdtemp(path.join(tmpdir(), "spdkit-config-"));
	});

	afterEach(async () => {
		await rm(cwd, { recursive: true, force: true });
	});

	const writeConfig = (contents: unknown) =>
		writeFile(path.join(cwd, "spdkit.config.json"), JSON.stringify(contents));

	it("uses defaults when nothing is set", () => {
		expect(loadConfig({ argv: [], env: {}, cwd })).toEqual({
			device: {
				vendorId: 0x0483,
				productId: 0x1230,
				responseDelayMs: 20,
				readTimeoutMs: 1000,
			},
			protocol: { zeroPageRetries: 2, allowBlankPages: false, chunkAttempts: 3 },
			logging: { level: "info", format: "simple" },
		});
	});

	it("reads spdkit.config.json from the working directory", async () => {
		await writeConfig({
			device: { vendorId: "0x1a86", productId: 0x5512 },
			logging: { level: "debug" },
		});

		const config = loadConfig({ argv: [], env: {}, cwd });

		expect(config.device.vendorId).toBe(0x1a86);
		expect(config.device.productId).toBe(0x5512);
		expect(config.logging).toEqual({ level: "debug", format: "simple" });
	});

	it("lets the environment override the file", async () => {
		await writeConfig({ device: { vendorId: 0x1a86, productId: 0x5512 } });

		const config = loadConfig({
			argv: [],
			env: { SPDKIT_VID: "0x2000", SPDKIT_LOG_LEVEL: "warn", SPDKIT_LOG_FORMAT: "json" },
			cwd,
		});

		expect(config.device.vendorId).toBe(0x2000);
		expect(config.device.productId).toBe(0x5512);
		expect(config.logging).toEqual({ level: "warn", format: "json" });
	});

	it("lets CLI flags override the environment", () => {
		const config = loadConfig({
			argv: ["list", "--vid", "4660", "--log-level=error", "--device", "hid:/dev/hidraw2"],
			env: { SPDKIT_VID: "0x2000", SPDKIT_LOG_LEVEL: "warn" },
			cwd,
		});

		expect(config.device.vendorId).toBe(4660);
		expect(config.device.deviceId).toBe("hid:/dev/hidraw2");
		expect(config.logging.level).toBe("error");
	});

	it("maps protocol flags", () => {
		const config = loadConfig({
			argv: ["read", "out.bin", "--zero-page-retries", "5", "--allow-blank-pages"],
			env: {},
			cwd,
		});

		expect(config.protocol).toEqual({
			zeroPageRetries: 5,
			allowBlankPages: true,
			chunkAttempts: 3,
		});
	});

	it("ignores empty environment variables", () => {
		expect(loadConfig({ argv: [], env: { SPDKIT_PID: "  " }, cwd }).device.productId).toBe(
			0x1230,
		);
	});

	it("reads the file named by --config", async () => {
		await writeFile(
			path.join(cwd, "bench.json"),
			JSON.stringify({ protocol: { chunkAttempts: 5 } }),
		);

		const config = loadConfig({ argv: ["--config", "bench.json"], env: {}, cwd });

		expect(config.protocol.chunkAttempts).toBe(5);
	});

	it("fails when --config names a missing file", () => {
		expect(() => loadConfig({ argv: ["--config", "nope.json"], env: {}, cwd })).toThrow(
			`Config file not found: ${path.join(cwd, "nope.json")}`,
		);
	});

	it("rejects an invalid log level", () => {
		expect(() => loadConfig({ argv: [], env: { SPDKIT_LOG_LEVEL: "loud" }, cwd })).toThrow(
			/^Invalid configuration: logging\.level: Invalid enum value/,
		);
	});

	it("rejects a vendor id wider than 16 bits", () => {
		expect(() => loadConfig({ argv: ["--vid", "0x10000"], env: {}, cwd })).toThrow(
			"Invalid configuration: device.vendorId: Number must be less than or equal to 65535",
		);
	});

	it("rejects unknown keys in the file", async () => {
		await writeConfig({ devcie: {} });

		expect(() => loadConfig({ argv: [], env: {}, cwd })).toThrow(ConfigError);
		expect(() => loadConfig({ argv: [], env: {}, cwd })).toThrow(
			/Unrecognized key\(s\) in object: 'devcie'/,
		);
	});

	it("reports malformed JSON with the file path", async () => {
		await writeFile(path.join(cwd, "spdkit.config.json"), "{ device: ");

		expect(() => loadConfig({ argv: [], env: {}, cwd })).toThrow(
			`${path.join(cwd, "spdkit.config.json")}: `,
		);
	});
});
