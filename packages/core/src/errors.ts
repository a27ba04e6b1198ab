/**
 * Error types shared by the engine and the games built on it.
 *
 * Every error is raised synchronously by the call that detected it and leaves
 * the game state exactly as it was before that call.
 */

export enum HexErrorCode {
  MOVE_OCCUPIED = "MOVE_OCCUPIED",
  ACTION_OUT_OF_RANGE = "ACTION_OUT_OF_RANGE",
  ACTION_INVALID = "ACTION_INVALID",
  GAME_OVER = "GAME_OVER",
  NOT_YOUR_TURN = "NOT_YOUR_TURN",
  INVALID_BOARD = "INVALID_BOARD",
}

export class HexError extends Error {
  readonly code: HexErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: HexErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "HexError";
    this.code = code;
    this.context = context;
  }
}

/** Target cell is already taken */
export class InvalidMoveError extends HexError {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number) {
    super(HexErrorCode.MOVE_OCCUPIED, `Illegal move (${row}, ${col}): cell is occupied`, { row, col });
    this.name = "InvalidMoveError";
    this.row = row;
    this.col = col;
  }
}

export class OutOfRangeActionError extends HexError {
  constructor(action: number, size: number) {
    super(
      HexErrorCode.ACTION_OUT_OF_RANGE,
      `Action ${action} is outside [0, ${size * size}) for a ${size}x${size} board`,
      { action, size }
    );
    this.name = "OutOfRangeActionError";
  }
}

export class GameOverError extends HexError {
  constructor(message = "Game is already over") {
    super(HexErrorCode.GAME_OVER, message);
    this.name = "GameOverError";
  }
}

export class NotYourTurnError extends HexError {
  constructor(playerId: string, currentPlayer: string) {
    super(HexErrorCode.NOT_YOUR_TURN, `Not your turn. Current player: ${currentPlayer}`, {
      playerId,
      currentPlayer,
    });
    this.name = "NotYourTurnError";
  }
}

export class InvalidActionError extends HexError {
  constructor(actionType: string) {
    super(HexErrorCode.ACTION_INVALID, `Invalid action: ${actionType}`, { actionType });
    this.name = "InvalidActionError";
  }
}

export class InvalidBoardError extends HexError {
  constructor(message: string) {
    super(HexErrorCode.INVALID_BOARD, message);
    this.name = "InvalidBoardError";
  }
}
