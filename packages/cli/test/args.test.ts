import { describe, expect, it } from "vitest";
import { UsageError, parseArgs, splitAssignment, stringFlag } from "../src/args.js";

describe("parseArgs", () => {
	it("splits the command, positionals and flags", () => {
		expect(parseArgs(["info", "dump.bin", "--format", "json"])).toEqual({
			command: "info",
			positionals: ["dump.bin"],
			flags: { format: "json" },
			sets: [],
			bytes: [],
		});
	});

	it("collects repeated --set and --byte assignments in order", () => {
		const args = parseArgs([
			"edit",
			"a.bin",
			"--set",
			"tAA=13.5",
			"--set=partNumber=TEST",
			"--byte",
			"0x140=0x80",
			"-o",
			"b.bin",
			"--fix-checksums",
		]);
		expect(args.sets).toEqual(["tAA=13.5", "partNumber=TEST"]);
		expect(args.bytes).toEqual(["0x140=0x80"]);
		expect(args.flags).toEqual({ output: "b.bin", "fix-checksums": true });
	});

	it("expands short aliases", () => {
		expect(parseArgs(["write", "a.bin", "-y", "-d", "hid:1"]).flags).toEqual({
			yes: true,
			device: "hid:1",
		});
	});

	it("treats everything after -- as positional", () => {
		expect(parseArgs(["diff", "--", "--odd.bin", "b.bin"]).positionals).toEqual([
			"--odd.bin",
			"b.bin",
		]);
	});

	it("rejects a value flag at the end", () => {
		expect(() => parseArgs(["list", "--vid"])).toThrow(new UsageError("--vid needs a value"));
	});

	it("rejects a value on a switch", () => {
		expect(() => parseArgs(["write", "--yes=1"])).toThrow("--yes does not take a value");
	});

	it("rejects unknown short options", () => {
		expect(() => parseArgs(["list", "-x"])).toThrow("Unknown option -x");
	});
});

describe("splitAssignment", () => {
	it("splits at the first equals sign", () => {
		expect(splitAssignment("partNumber=A=B", "set")).toEqual(["partNumber", "A=B"]);
	});

	it("requires a key", () => {
		expect(() => splitAssignment("=5", "set")).toThrow('--set expects key=value, got "=5"');
	});
});

describe("stringFlag", () => {
	it("returns undefined for an absent flag", () => {
		expect(stringFlag(parseArgs(["info"]), "format")).toBeUndefined();
	});
});
