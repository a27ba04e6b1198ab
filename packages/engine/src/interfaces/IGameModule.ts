import { GameConfig, GameState, Action, Outcome, Observation } from "@hexlab/core";

/**
 * The seven-function ABI every game module implements.
 *
 * Every function must be deterministic given the same inputs and must not
 * mutate the state it receives.
 */
export interface IGameModule {
  /** Unique identifier for this game (e.g. "hex") */
  readonly gameId: string;

  readonly name: string;
  readonly description: string;

  readonly minPlayers: number;
  readonly maxPlayers: number;

  /** Initialize a new game state */
  init(config: GameConfig, players: string[], rngSeed: string): GameState;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState, playerId: string, action: Action): boolean;

  /** Apply an action and return the new state */
  applyAction(state: GameState, playerId: string, action: Action): GameState;

  isTerminal(state: GameState): boolean;

  /** Outcome of the state; "in progress" outcomes carry no winner */
  getOutcome(state: GameState): Outcome;

  getObservation(state: GameState, playerId: string): Observation;

  /** All legal actions for a player; empty when it is not their turn */
  getLegalActions(state: GameState, playerId: string): Action[];
}
