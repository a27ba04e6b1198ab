export * from "./types/game";
export * from "./types/match";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { TranscriptBuilder } from "./libs/TranscriptBuilder";
export * from "./errors";

export { default as config, parseBoardSize, parseLogLevel, parseMoveMode } from "./config";
export type { MoveMode } from "./config";
export { createLogger } from "./logger";
export type { Logger } from "./logger";
