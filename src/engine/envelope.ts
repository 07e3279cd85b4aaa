export type EngineErrorCode =
  // notation
  | "MALFORMED_NOTATION"
  | "INVALID_POINT"
  | "INVALID_KEYWORD"
  // legality
  | "MUST_ENTER_FROM_BAR"
  | "NO_CHECKER_AT_ORIGIN"
  | "WRONG_DIRECTION"
  | "ILLEGAL_DISTANCE"
  | "BLOCKED_DESTINATION"
  | "ILLEGAL_BEAR_OFF"
  | "INCOMPLETE_TURN"
  // dice
  | "INVALID_DICE_VALUE"
  | "OPENING_ROLL_TIED"
  // turn/state
  | "WRONG_ACTOR"
  | "BAD_TURN_STATE"
  | "GAME_ENDED";

export type EngineError = {
  code: EngineErrorCode;
  message: string;

  /** Offending request, in notation (e.g. "13/8"). */
  request?: string;

  /** Offending die value, where one applies. */
  die?: number;
};

export type Rejected = {
  ok: false;
  error: EngineError;
};

export function reject(
  code: EngineErrorCode,
  message: string,
  detail: { request?: string; die?: number } = {}
): Rejected {
  return { ok: false, error: { code, message, ...detail } };
}
