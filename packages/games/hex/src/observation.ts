import { GameState, Observation } from "@hexlab/core";
import { cloneBoard } from "./state";
import { hexData } from "./snapshot";

/**
 * Hex is a complete information game, so every player sees the same board.
 * Region grids stay internal.
 */
export function getObservationForPlayer(state: GameState, _playerId: string): Observation {
  const data = hexData(state);

  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: {
      size: data.size,
      board: cloneBoard(data.board),
      colors: { ...data.colors },
      activeColor: data.activeColor,
      emptyCount: data.emptyCount,
      lastMove: data.lastMove ? { ...data.lastMove } : null,
      terminalStatus: data.terminalStatus,
      winnerColor: data.winnerColor,
    },
  };
}
