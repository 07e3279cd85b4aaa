// src/engine/publicApi.ts
//
// Rules queries for callers that hold a GameState rather than a bare board.

import type { GameState, Step } from "../types";
import { listLegalSteps, maxPlayableDice } from "./legalMoves";

/**
 * Contract name: legalSteps
 * Single steps available to the player on roll with the dice still unplayed.
 * Empty when no dice are pending or the game is over.
 */
export function legalSteps(game: GameState): Step[] {
  const phase = game.phase;
  if (phase.status !== "awaitingMoves") return [];
  return listLegalSteps(game.board, phase.color, phase.dice.remaining);
}

/**
 * Contract name: playableDiceCount
 * How many of the pending dice the player on roll is obliged to use.
 */
export function playableDiceCount(game: GameState): number {
  const phase = game.phase;
  if (phase.status !== "awaitingMoves") return 0;
  return maxPlayableDice(game.board, phase.color, phase.dice.remaining);
}
