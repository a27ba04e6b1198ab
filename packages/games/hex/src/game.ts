import {
  config,
  GameOverError,
  InvalidBoardError,
  InvalidMoveError,
  MoveMode,
  OutOfRangeActionError,
} from "@hexlab/core";
import {
  Board,
  Coordinate,
  Stone,
  actionToCoordinate,
  cloneBoard,
  coordinateToAction,
  countEmpty,
  emptyBoard,
  isCellValue,
  otherColor,
} from "./state";
import { RegionGrids, RegionTracker } from "./regions";

export type GameStatus =
  | { readonly kind: "in_progress" }
  | { readonly kind: "won"; readonly winner: Stone }
  | { readonly kind: "drawn" };

export interface HexGameOptions {
  /** Color to move first; defaults to Black */
  activeColor?: Stone;
  /** Starting position; copied, never aliased */
  board?: Board;
  /** Side of an empty starting board when no board is given; defaults to HEX_BOARD_SIZE */
  size?: number;
  /**
   * Region grids previously computed for `board`. Supplying them skips
   * replaying every pre-placed stone through the trackers.
   */
  regions?: RegionGrids;
  /**
   * "safe" (default) validates every move. "fast" trusts the caller: moves on
   * occupied or out-of-range cells corrupt the state instead of throwing.
   */
  mode?: MoveMode;
}

function assertSize(size: number): number {
  if (!Number.isInteger(size) || size < 1) {
    throw new InvalidBoardError(`Board size must be a positive integer, got ${size}`);
  }
  return size;
}

function assertBoard(board: Board): void {
  const size = board.length;
  if (size === 0) {
    throw new InvalidBoardError("Board must have at least one cell");
  }
  for (const row of board) {
    if (row.length !== size) {
      throw new InvalidBoardError(`Board must be square, got a row of ${row.length} in a ${size}-row board`);
    }
    if (!row.every(isCellValue)) {
      throw new InvalidBoardError('Board cells must be "B", "W" or ""');
    }
  }
}

/**
 * Hex board state machine.
 *
 * Owns the board, whose turn it is and the terminal status, and keeps one
 * RegionTracker per color up to date so a win is detected on the move that
 * completes it.
 */
export class HexGame {
  readonly size: number;
  readonly mode: MoveMode;
  private readonly cells: Board;
  private readonly trackers: Record<Stone, RegionTracker>;
  private active: Stone;
  private empty: number;
  private state: GameStatus = { kind: "in_progress" };

  /** Builds a game from options, or an independent copy of another game */
  constructor(options: HexGameOptions | HexGame = {}) {
    if (options instanceof HexGame) {
      this.size = options.size;
      this.mode = options.mode;
      this.cells = cloneBoard(options.cells);
      this.empty = options.empty;
      this.trackers = { B: options.trackers.B.clone(), W: options.trackers.W.clone() };
      this.active = options.active;
      this.state = { ...options.state };
      return;
    }

    const board = options.board ?? emptyBoard(assertSize(options.size ?? config.boardSize));
    assertBoard(board);

    this.size = board.length;
    this.mode = options.mode ?? "safe";
    this.cells = cloneBoard(board);
    this.empty = countEmpty(this.cells);

    const regions = options.regions;
    this.trackers = {
      B: new RegionTracker("B", this.size, regions?.B),
      W: new RegionTracker("W", this.size, regions?.W),
    };

    if (!regions) {
      for (let row = 0; row < this.size; row++) {
        for (let col = 0; col < this.size; col++) {
          const cell = this.cells[row][col];
          if (cell !== "") this.trackers[cell].insert(row, col);
        }
      }
    }

    this.active = options.activeColor ?? "B";
  }

  /** The color whose move is next. Flips on every move, the final one included */
  get activeColor(): Stone {
    return this.active;
  }

  get emptyCount(): number {
    return this.empty;
  }

  get status(): GameStatus {
    return this.state;
  }

  get done(): boolean {
    return this.state.kind !== "in_progress";
  }

  get winner(): Stone | null {
    return this.state.kind === "won" ? this.state.winner : null;
  }

  /** Deep copy of the board */
  get board(): Board {
    return cloneBoard(this.cells);
  }

  /** Region label of (row, col) in a color's tracker; 0 when not part of a group */
  regionLabel(color: Stone, row: number, col: number): number {
    return this.trackers[color].labelAt(row, col);
  }

  /** Whether a color's two edges are joined */
  isConnected(color: Stone): boolean {
    return this.trackers[color].isConnected();
  }

  /** Deep copies of both padded region grids, reusable as `regions` on a new game */
  regions(): RegionGrids {
    return { B: this.trackers.B.toGrid(), W: this.trackers.W.toGrid() };
  }

  actionToCoordinate(action: number): Coordinate {
    return actionToCoordinate(action, this.size);
  }

  coordinateToAction(row: number, col: number): number {
    return coordinateToAction(row, col, this.size);
  }

  isInRange(action: number): boolean {
    return Number.isInteger(action) && action >= 0 && action < this.size * this.size;
  }

  isValidMove(action: number): boolean {
    if (!this.isInRange(action)) return false;
    const { row, col } = this.actionToCoordinate(action);
    return this.cells[row][col] === "";
  }

  /** Apply a move using the game's configured mode */
  applyMove(action: number): Stone | null {
    return this.mode === "safe" ? this.applyMoveSafe(action) : this.applyMoveFast(action);
  }

  /**
   * Validate, then apply. Throws OutOfRangeActionError, GameOverError or
   * InvalidMoveError and leaves the game untouched on a rejected move.
   */
  applyMoveSafe(action: number): Stone | null {
    if (!this.isInRange(action)) {
      throw new OutOfRangeActionError(action, this.size);
    }
    if (this.done) {
      throw new GameOverError();
    }
    const { row, col } = this.actionToCoordinate(action);
    if (this.cells[row][col] !== "") {
      throw new InvalidMoveError(row, col);
    }
    return this.applyMoveFast(action);
  }

  /**
   * Apply without any validation. The caller guarantees the action is in
   * range, the cell is empty and the game is not over.
   *
   * Returns the winner, or null while nobody has won.
   */
  applyMoveFast(action: number): Stone | null {
    const { row, col } = this.actionToCoordinate(action);
    const color = this.active;

    this.cells[row][col] = color;
    this.empty--;

    const tracker = this.trackers[color];
    tracker.insert(row, col);

    if (tracker.isConnected()) {
      this.state = { kind: "won", winner: color };
    } else if (this.empty <= 0) {
      this.state = { kind: "drawn" };
    }

    this.active = otherColor(color);
    return this.winner;
  }

  /** Actions of all empty cells, row-major */
  possibleActions(): number[] {
    const actions: number[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.cells[row][col] === "") actions.push(this.coordinateToAction(row, col));
      }
    }
    return actions;
  }

  /** Independent deep copy, for rollouts that must not touch this game */
  copy(): HexGame {
    return new HexGame(this);
  }
}
