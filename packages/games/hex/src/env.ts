import { config, createLogger, MoveMode } from "@hexlab/core";
import { HexGame } from "./game";
import { RegionGrids } from "./regions";
import { Board, Stone, cloneBoard, emptyBoard, otherColor } from "./state";

const log = createLogger("hex-env");

/** Context handed to the opponent along with the board */
export interface MoveInfo {
  state: Board;
  /** The move just played against the callee, if any */
  lastMoveOpponent: number | null;
  /** The callee's own previous move, if any */
  lastMovePlayer: number | null;
}

/**
 * Picks the opponent's next action. The returned action goes through the
 * environment's normal move checks and nothing else.
 */
export type OpponentPolicy = (board: Board, color: Stone, info: MoveInfo) => number;

export interface HexObservation {
  board: Board;
  activeColor: Stone;
}

export interface ResetResult {
  observation: HexObservation;
  info: MoveInfo;
}

export interface StepResult {
  observation: HexObservation;
  /** 1 when the agent has won, -1 when the opponent has, 0 otherwise */
  reward: number;
  done: boolean;
  info: MoveInfo;
}

export interface HexEnvOptions {
  opponentPolicy: OpponentPolicy;
  /** Color the agent plays; defaults to Black */
  playerColor?: Stone;
  /** Color that moves first; defaults to Black */
  activeColor?: Stone;
  /** Starting position; defaults to an empty board of `boardSize` */
  board?: Board;
  boardSize?: number;
  /** Region grids of `board`, to skip the replay on the first reset */
  regions?: RegionGrids;
  mode?: MoveMode;
}

/**
 * Plays one color against a fixed opponent policy, one episode per reset.
 *
 * The region grids of the starting position are computed once, on the first
 * reset, and reused by every later reset.
 */
export class HexEnv {
  readonly playerColor: Stone;
  private readonly opponentPolicy: OpponentPolicy;
  private readonly initialBoard: Board;
  private readonly firstColor: Stone;
  private readonly mode: MoveMode;
  private initialRegions: RegionGrids | undefined;
  private simulator: HexGame | null = null;
  private lastWinner: Stone | null = null;
  private previousOpponentMove: number | null = null;

  constructor(options: HexEnvOptions) {
    this.opponentPolicy = options.opponentPolicy;
    this.playerColor = options.playerColor ?? "B";
    this.firstColor = options.activeColor ?? "B";
    this.initialBoard = cloneBoard(options.board ?? emptyBoard(options.boardSize ?? config.boardSize));
    this.initialRegions = options.regions;
    this.mode = options.mode ?? config.moveMode;
  }

  get opponent(): Stone {
    return otherColor(this.playerColor);
  }

  get winner(): Stone | null {
    return this.lastWinner;
  }

  /** The running game; throws before the first reset */
  get game(): HexGame {
    if (!this.simulator) {
      throw new Error("Environment not initialized. Call reset() before playing.");
    }
    return this.simulator;
  }

  reset(): ResetResult {
    this.simulator = new HexGame({
      activeColor: this.firstColor,
      board: this.initialBoard,
      regions: this.initialRegions,
      mode: this.mode,
    });
    if (!this.initialRegions) {
      this.initialRegions = this.simulator.regions();
    }
    this.lastWinner = null;
    this.previousOpponentMove = null;

    if (this.playerColor !== this.firstColor) {
      this.opponentMove({ state: this.simulator.board, lastMoveOpponent: null, lastMovePlayer: null });
    }

    log.debug({ playerColor: this.playerColor, size: this.simulator.size }, "Episode reset");

    return {
      observation: this.observe(),
      info: { state: this.simulator.board, lastMoveOpponent: this.previousOpponentMove, lastMovePlayer: null },
    };
  }

  /**
   * Play the agent's action, then the opponent's reply.
   *
   * A rejected agent action leaves the episode untouched. A rejected opponent
   * reply is thrown after the agent's stone is already on the board, with the
   * turn still on the opponent's color; `game.activeColor` shows it, and the
   * episode should be reset before stepping again.
   */
  step(action: number): StepResult {
    const game = this.game;

    if (game.done) {
      log.warn({ action }, "Step on a finished episode ignored");
    } else {
      this.lastWinner = game.applyMove(action);
    }

    let opponentAction: number | null = null;
    if (!game.done) {
      opponentAction = this.opponentMove({
        state: game.board,
        lastMoveOpponent: action,
        lastMovePlayer: this.previousOpponentMove,
      });
    }

    if (game.done) {
      log.debug({ winner: this.lastWinner, playerColor: this.playerColor }, "Episode finished");
    }

    return {
      observation: this.observe(),
      reward: this.reward(),
      done: game.done,
      info: { state: game.board, lastMoveOpponent: opponentAction, lastMovePlayer: action },
    };
  }

  private reward(): number {
    if (this.lastWinner === this.playerColor) return 1;
    if (this.lastWinner === this.opponent) return -1;
    return 0;
  }

  private observe(): HexObservation {
    return { board: this.game.board, activeColor: this.game.activeColor };
  }

  private opponentMove(info: MoveInfo): number {
    const game = this.game;
    const action = this.opponentPolicy(game.board, this.opponent, info);
    this.lastWinner = game.applyMove(action);
    this.previousOpponentMove = action;
    return action;
  }
}
