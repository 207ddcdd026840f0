#!/usr/bin/env node
/**
 * spd: DDR4 SPD programmer command-line tool
 *
 * Usage:
 *   spd <command> [options]     (see `spd --help`)
 *
 * Environment variables:
 *   SPDKIT_VID, SPDKIT_PID      USB identifiers of the programmer
 *   SPDKIT_LOG_LEVEL            debug, info, warn or error
 *   SPDKIT_LOG_FORMAT           simple or json
 */

import { runCli } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => {
	controller.abort(new Error("Interrupted"));
});

process.exitCode = await runCli(process.argv.slice(2), {
	stdout: (text) => {
		process.stdout.write(text);
	},
	stderr: (text) => {
		process.stderr.write(text);
	},
	env: process.env,
	cwd: process.cwd(),
	signal: controller.signal,
});
