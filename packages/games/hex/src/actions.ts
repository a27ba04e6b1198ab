import { Action, GameState } from "@hexlab/core";
import { hexData, restoreGame } from "./snapshot";

/** A hex action: place a stone at (row, col) */
export interface PlaceAction extends Action {
  type: "place";
  data: { row: number; col: number };
}

export function placeAction(row: number, col: number): PlaceAction {
  return { type: "place", data: { row, col } };
}

function isIndex(value: unknown, size: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value < size;
}

/** Type guard for PlaceAction with bounds validation against a size x size board */
export function isPlaceAction(action: Action, size: number): action is PlaceAction {
  return action.type === "place" && isIndex(action.data.row, size) && isIndex(action.data.col, size);
}

/**
 * Get all legal actions for a player in the current state, row-major.
 * Returns empty array if it's not the player's turn or the game is terminal.
 */
export function getLegalActionsForPlayer(state: GameState, playerId: string): Action[] {
  const data = hexData(state);

  if (data.terminalStatus !== null || state.currentPlayer !== playerId) {
    return [];
  }

  const game = restoreGame(data);
  return game.possibleActions().map((action) => {
    const { row, col } = game.actionToCoordinate(action);
    return placeAction(row, col);
  });
}
