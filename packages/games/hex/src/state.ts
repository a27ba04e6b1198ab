import type { RegionGrids } from "./regions";

/** A stone color: "B" (Black) or "W" (White) */
export type Stone = "B" | "W";

/** Cell values: a stone, or "" (empty) */
export type CellValue = Stone | "";

/** N x N board, row-major */
export type Board = CellValue[][];

export interface Coordinate {
  row: number;
  col: number;
}

export const STONES: readonly Stone[] = ["B", "W"];

export function otherColor(color: Stone): Stone {
  return color === "B" ? "W" : "B";
}

export function isStone(value: unknown): value is Stone {
  return value === "B" || value === "W";
}

export function isCellValue(value: unknown): value is CellValue {
  return value === "" || isStone(value);
}

/** Create an empty size x size board */
export function emptyBoard(size: number): Board {
  return Array.from({ length: size }, () => Array<CellValue>(size).fill(""));
}

/** Deep clone a board */
export function cloneBoard(board: Board): Board {
  return board.map((r) => [...r]);
}

export function countEmpty(board: Board): number {
  let empty = 0;
  for (const row of board) {
    for (const cell of row) {
      if (cell === "") empty++;
    }
  }
  return empty;
}

/** action = row * size + col */
export function coordinateToAction(row: number, col: number, size: number): number {
  return row * size + col;
}

/** row = action div size, col = action mod size */
export function actionToCoordinate(action: number, size: number): Coordinate {
  const row = Math.floor(action / size);
  return { row, col: action - size * row };
}

/**
 * Hex adjacency offsets. Each hex cell has 6 neighbors:
 *   (-1, 0), (-1, +1),
 *   (0, -1),           (0, +1),
 *   (+1, -1), (+1, 0)
 *
 * On a square grid this is the 3x3 window around a cell without its
 * top-left and bottom-right corners.
 */
export const HEX_NEIGHBORS: readonly (readonly [number, number])[] = [
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
];

export type TerminalStatus = null | "connected" | "board_full";

/** The game-specific data stored in GameState.data */
export interface HexData {
  size: number;
  board: Board;
  /** Maps player id to their color */
  colors: Record<string, Stone>;
  /** The color of the player whose turn it is */
  activeColor: Stone;
  /** Padded region grids of both colors, so a restored game skips the replay */
  regions: RegionGrids;
  emptyCount: number;
  /** The last move played */
  lastMove: Coordinate | null;
  terminalStatus: TerminalStatus;
  /** The color that won, or null if no winner yet */
  winnerColor: Stone | null;
}
