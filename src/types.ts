// src/types.ts

export type Color = "white" | "black";

export const COLORS: readonly Color[] = ["white", "black"];

/**
 * One of the 24 board points. `color` is null exactly when `count` is 0.
 */
export interface PointState {
  color: Color | null;
  count: number;
}

/**
 * Points are stored by absolute index 1..24 (array slot = index - 1).
 * Absolute index n is Black's point n and White's point 25 - n.
 */
export interface Board {
  points: readonly PointState[];
  bar: Readonly<Record<Color, number>>;
  off: Readonly<Record<Color, number>>;
}

export interface DiceRoll {
  faces: readonly [number, number];

  // Values still playable this turn, in roll order. Doubles expand to four.
  remaining: readonly number[];
}

// Notation stops, always in the mover's perspective.
export type Origin = number | "bar";
export type Destination = number | "off";

export interface MoveRequest {
  from: Origin;
  to: Destination;

  // Whitespace group the hop came from; hops of one chain share it.
  chain: number;
  hop: number;
}

/**
 * A single die's worth of movement, resolved against the board.
 * Points are in the mover's perspective.
 */
export type Step =
  | { kind: "enter"; to: number; die: number; hit: boolean }
  | { kind: "normal"; from: number; to: number; die: number; hit: boolean }
  | { kind: "bearOff"; from: number; die: number; hit: false };

export interface GameResult {
  winner: Color;
}

export type GamePhase =
  | { status: "awaitingRoll"; color: Color }
  | { status: "awaitingMoves"; color: Color; dice: DiceRoll }
  | { status: "gameOver"; winner: Color };

export interface TurnRecord {
  color: Color;
  faces: readonly [number, number];
  notation: string;
  steps: readonly Step[];
  forfeited: boolean;
  beforeHash: string;
  afterHash: string;
}

export interface GameState {
  board: Board;
  phase: GamePhase;

  // Accepted turns and forfeits, oldest first.
  history: readonly TurnRecord[];

  result?: GameResult;
}
