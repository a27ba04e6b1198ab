import {
  config,
  GameConfig,
  GameState,
  Action,
  Outcome,
  Observation,
  GameOverError,
  InvalidActionError,
} from "@hexlab/core";
import { IGameModule } from "@hexlab/engine";
import { HexGame } from "./game";
import { Stone } from "./state";
import { isPlaceAction, getLegalActionsForPlayer } from "./actions";
import { getObservationForPlayer } from "./observation";
import { hexData, restoreGame, toHexData } from "./snapshot";

function boardSizeSetting(gameConfig: GameConfig): number {
  const size = gameConfig.settings?.boardSize;
  return typeof size === "number" && Number.isInteger(size) && size >= 1 ? size : config.boardSize;
}

export const HexModule: IGameModule = {
  gameId: "hex",
  name: "Hex",
  description:
    "Connect your two sides of the board. Black connects top-bottom, White connects left-right. No draws possible.",
  minPlayers: 2,
  maxPlayers: 2,

  init(gameConfig: GameConfig, players: string[], _rngSeed: string): GameState {
    if (players.length !== 2) {
      throw new Error("Hex requires exactly 2 players");
    }

    const colors: Record<string, Stone> = {
      [players[0]]: "B",
      [players[1]]: "W",
    };

    const game = new HexGame({ size: boardSizeSetting(gameConfig), activeColor: "B" });

    return {
      gameId: gameConfig.gameId,
      players,
      currentPlayer: players[0],
      turnNumber: 0,
      data: toHexData(game, colors, null) as unknown as Record<string, unknown>,
    };
  },

  validateAction(state: GameState, playerId: string, action: Action): boolean {
    if (state.currentPlayer !== playerId) {
      return false;
    }

    const data = hexData(state);
    if (data.terminalStatus !== null) {
      return false;
    }

    if (!isPlaceAction(action, data.size)) {
      return false;
    }

    const { row, col } = action.data;
    return data.board[row][col] === "";
  },

  applyAction(state: GameState, playerId: string, action: Action): GameState {
    const data = hexData(state);

    if (data.terminalStatus !== null) {
      throw new GameOverError();
    }
    if (!isPlaceAction(action, data.size)) {
      throw new InvalidActionError(action.type);
    }

    const { row, col } = action.data;
    const game = restoreGame(data);
    game.applyMove(game.coordinateToAction(row, col));

    const otherPlayer = state.players.find((p) => p !== playerId) ?? playerId;

    return {
      gameId: state.gameId,
      players: state.players,
      currentPlayer: otherPlayer,
      turnNumber: state.turnNumber + 1,
      data: toHexData(game, data.colors, { row, col }) as unknown as Record<string, unknown>,
    };
  },

  isTerminal(state: GameState): boolean {
    return hexData(state).terminalStatus !== null;
  },

  getOutcome(state: GameState): Outcome {
    const data = hexData(state);

    if (data.terminalStatus === "connected" && data.winnerColor) {
      const winnerPlayer =
        Object.entries(data.colors).find(([_, color]) => color === data.winnerColor)?.[0] ?? null;

      const scores: Record<string, number> = {};
      for (const player of state.players) {
        scores[player] = player === winnerPlayer ? 1 : 0;
      }

      return { winner: winnerPlayer, draw: false, scores, reason: "connected" };
    }

    // Full board with no connection; cannot happen on a regular hex board
    if (data.terminalStatus === "board_full") {
      const scores: Record<string, number> = {};
      for (const player of state.players) {
        scores[player] = 0.5;
      }
      return { winner: null, draw: true, scores, reason: "board_full" };
    }

    return { winner: null, draw: false, scores: {}, reason: "game_in_progress" };
  },

  getObservation(state: GameState, playerId: string): Observation {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
