// Public engine surface

// Point/bar model
export { makeBoard, makeStartingBoard } from "./makeState";
export type { BoardLayout, PointCounts } from "./makeState";
export {
  checkersAt,
  topColor,
  isOpen,
  barCount,
  offCount,
  pipCount,
  allInHome,
} from "./stateUtils";
export { oppositeColor, toAbsolute, toPerspective } from "./boardMapping";

// Dice
export {
  makeDiceRoll,
  remainingValues,
  consumeDie,
  isDouble,
  hasRemaining,
  formatDice,
  resolveOpeningRoll,
} from "./dice";

// Notation
export { parseNotation, formatRequest, formatRequests } from "./notation";
export type { ParseResult } from "./notation";

// Legality
export { validateTurn } from "./validateTurn";
export type { Accepted, TurnDecision } from "./validateTurn";
export { listLegalSteps, maxPlayableDice, hasAnyLegalStep } from "./legalMoves";
export { applyStep } from "./applyStep";
export { legalSteps, playableDiceCount } from "./publicApi";

// Turn/game state machine
export { createGame, startWithOpeningRoll, rollDice, currentColor } from "./turn";
export type { CreateGameOptions, RollResponse } from "./turn";
export { submitTurn } from "./tryApply";
export type { TurnResponse } from "./tryApply";
export { snapshot } from "./snapshot";
export type { BoardSnapshot, PointView } from "./snapshot";

// Deterministic board hash
export { hashBoard } from "./stateHash";

// Response envelope
export type { EngineError, EngineErrorCode, Rejected } from "./envelope";
