export { HexModule } from "./rules";
export { HexGame } from "./game";
export type { GameStatus, HexGameOptions } from "./game";
export { HexEnv } from "./env";
export type {
  HexEnvOptions,
  HexObservation,
  MoveInfo,
  OpponentPolicy,
  ResetResult,
  StepResult,
} from "./env";
export { RegionTracker, borderGrid, cloneRegionGrid, NO_REGION, NEAR_EDGE, FAR_EDGE } from "./regions";
export type { RegionGrid, RegionGrids } from "./regions";
export {
  STONES,
  actionToCoordinate,
  cloneBoard,
  coordinateToAction,
  emptyBoard,
  isStone,
  otherColor,
} from "./state";
export type { Board, CellValue, Coordinate, HexData, Stone, TerminalStatus } from "./state";
export { isPlaceAction, placeAction } from "./actions";
export type { PlaceAction } from "./actions";
