export * from "./args.js";
export * from "./cli.js";
export * from "./config.js";
export * from "./context.js";
export * from "./device.js";
export * from "./edit.js";
export * from "./formatters/diff-formatter.js";
export * from "./formatters/markdown.js";
export * from "./formatters/spd-report.js";
export * from "./logger.js";
