export * from "./cancellation.js";
export * from "./cli-parser.js";
export * from "./config.js";
export * from "./fs.js";
export * from "./logger.js";
