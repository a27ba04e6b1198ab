import dotenv from "dotenv";
import bunyan from "bunyan";

dotenv.config({ quiet: true });

export type MoveMode = "safe" | "fast";

const LOG_LEVELS: readonly bunyan.LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function parseLogLevel(raw: string | undefined): bunyan.LogLevelString {
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

export function parseBoardSize(raw: string | undefined): number {
  const size = parseInt(raw || "5", 10);
  return Number.isInteger(size) && size >= 1 ? size : 5;
}

/** Anything but an explicit "fast" keeps the checked move path */
export function parseMoveMode(raw: string | undefined): MoveMode {
  return raw === "fast" ? "fast" : "safe";
}

export default {
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  boardSize: parseBoardSize(process.env.HEX_BOARD_SIZE),
  moveMode: parseMoveMode(process.env.HEX_MOVE_MODE),
};
