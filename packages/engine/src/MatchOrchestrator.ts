import {
  GameState,
  Action,
  Outcome,
  Observation,
  MatchTranscript,
  TranscriptBuilder,
  GameOverError,
  NotYourTurnError,
  InvalidActionError,
  createLogger,
} from "@hexlab/core";
import { IGameModule } from "./interfaces/IGameModule";

const log = createLogger("engine");

export interface MatchOrchestratorOptions {
  game: IGameModule;
  players: string[];
  matchId: string;
  rngSeed?: string;
  settings?: Record<string, unknown>;
}

export interface SubmitResult {
  observation: Observation;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Orchestrates a single match: manages turns, validates moves,
 * applies state transitions, and builds the transcript.
 */
export class MatchOrchestrator {
  private readonly game: IGameModule;
  private readonly matchId: string;
  private state: GameState;
  private readonly transcript: TranscriptBuilder;

  constructor(opts: MatchOrchestratorOptions) {
    this.game = opts.game;
    this.matchId = opts.matchId;

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.state = opts.game.init(config, opts.players, opts.rngSeed || "0");
    this.transcript = new TranscriptBuilder(opts.matchId, opts.game.gameId, this.state);

    log.info({ matchId: this.matchId, gameId: this.game.gameId, players: opts.players }, "Match created");
  }

  getState(): GameState {
    return this.state;
  }

  getCurrentPlayer(): string {
    return this.state.currentPlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(playerId: string): Observation {
    return this.game.getObservation(this.state, playerId);
  }

  getLegalActions(playerId: string): Action[] {
    return this.game.getLegalActions(this.state, playerId);
  }

  getTranscript(): MatchTranscript {
    return this.transcript.getTranscript();
  }

  /**
   * Submit a move. Returns the mover's observation of the new state, or
   * throws without touching the state if the move is not acceptable.
   */
  submitAction(playerId: string, action: Action): SubmitResult {
    if (this.isTerminal()) {
      throw new GameOverError();
    }

    if (this.state.currentPlayer !== playerId) {
      throw new NotYourTurnError(playerId, this.state.currentPlayer);
    }

    if (!this.game.validateAction(this.state, playerId, action)) {
      throw new InvalidActionError(action.type);
    }

    this.state = this.game.applyAction(this.state, playerId, action);
    this.transcript.addEntry(playerId, action, this.state);

    const terminal = this.game.isTerminal(this.state);
    const observation = this.game.getObservation(this.state, playerId);

    if (!terminal) {
      log.debug({ matchId: this.matchId, playerId, turn: this.state.turnNumber }, "Move applied");
      return { observation, terminal };
    }

    const outcome = this.game.getOutcome(this.state);
    log.info(
      { matchId: this.matchId, winner: outcome.winner, reason: outcome.reason, moves: this.transcript.getEntryCount() },
      "Match completed"
    );
    return { observation, terminal, outcome };
  }
}
