import { GameState } from "@hexlab/core";
import { HexGame } from "./game";
import { Coordinate, HexData, Stone, TerminalStatus } from "./state";

export function hexData(state: GameState): HexData {
  return state.data as unknown as HexData;
}

/** Rebuild a checked-mode game from stored data, reusing its region grids */
export function restoreGame(data: HexData): HexGame {
  return new HexGame({
    board: data.board,
    regions: data.regions,
    activeColor: data.activeColor,
    mode: "safe",
  });
}

function terminalStatusOf(game: HexGame): TerminalStatus {
  switch (game.status.kind) {
    case "won":
      return "connected";
    case "drawn":
      return "board_full";
    case "in_progress":
      return null;
  }
}

export function toHexData(
  game: HexGame,
  colors: Record<string, Stone>,
  lastMove: Coordinate | null
): HexData {
  return {
    size: game.size,
    board: game.board,
    colors: { ...colors },
    activeColor: game.activeColor,
    regions: game.regions(),
    emptyCount: game.emptyCount,
    lastMove: lastMove ? { ...lastMove } : null,
    terminalStatus: terminalStatusOf(game),
    winnerColor: game.winner,
  };
}
