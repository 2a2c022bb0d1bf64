export * from "./types";
export * from "./errors";
export * from "./ingest/index";
export * from "./validation/index";
export * from "./report/index";
export * from "./archive";
export * from "./whitespace";
export { processTranscript } from "./process";
export type { ProcessOptions } from "./process";
export { getLogger } from "./logger";
export type { Logger, LogContext } from "./logger";
