export * from "./catalog.js";
export * from "./materializer.js";
export * from "./orchestrator.js";
export * from "./progress.js";
export * from "./report.js";
export type * from "./types.js";
