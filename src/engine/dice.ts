// src/engine/dice.ts

import type { Color, DiceRoll } from "../types";
import { isDieValue } from "./constants";
import { reject, type Rejected } from "./envelope";

/**
 * Expand two faces into this turn's playable values.
 * Doubles play four times.
 */
export function makeDiceRoll(a: number, b: number): DiceRoll {
  if (!isDieValue(a) || !isDieValue(b)) {
    throw new Error(`makeDiceRoll: faces must be integers 1-6, got ${a},${b}`);
  }
  const remaining = a === b ? [a, a, a, a] : [a, b];
  return { faces: [a, b], remaining };
}

export function isDouble(roll: DiceRoll): boolean {
  return roll.faces[0] === roll.faces[1];
}

export function remainingValues(roll: DiceRoll): number[] {
  return roll.remaining.slice();
}

export function hasRemaining(roll: DiceRoll): boolean {
  return roll.remaining.length > 0;
}

export function consumeDie(
  roll: DiceRoll,
  value: number
): { ok: true; roll: DiceRoll } | Rejected {
  const idx = roll.remaining.indexOf(value);
  if (idx < 0) {
    return reject("INVALID_DICE_VALUE", `Die ${value} is not available (remaining: ${formatValues(roll.remaining)}).`, {
      die: value,
    });
  }

  const remaining = roll.remaining.slice();
  remaining.splice(idx, 1);
  return { ok: true, roll: { faces: roll.faces, remaining } };
}

/**
 * Multiset subtraction: remove each value in `used` from `pool` (once per occurrence).
 */
export function subtractDice(pool: readonly number[], used: readonly number[]): { ok: boolean; remaining: number[] } {
  const remaining = pool.slice();
  for (const u of used) {
    const idx = remaining.indexOf(u);
    if (idx < 0) return { ok: false, remaining: pool.slice() };
    remaining.splice(idx, 1);
  }
  return { ok: true, remaining };
}

export function formatValues(values: readonly number[]): string {
  return values.length === 0 ? "none" : values.join("-");
}

export function formatDice(roll: DiceRoll): string {
  return `${roll.faces[0]}-${roll.faces[1]}`;
}

/* ---------- OPENING ROLL ---------- */

export type OpeningRoll = {
  ok: true;
  color: Color;
  roll: DiceRoll;
};

/**
 * Each side throws one die; the higher die moves first and plays both values.
 * Ties are rerolled by the caller.
 */
export function resolveOpeningRoll(whiteDie: number, blackDie: number): OpeningRoll | Rejected {
  if (!isDieValue(whiteDie) || !isDieValue(blackDie)) {
    return reject("INVALID_DICE_VALUE", `Opening dice must be integers 1-6, got ${whiteDie},${blackDie}.`);
  }
  if (whiteDie === blackDie) {
    return reject("OPENING_ROLL_TIED", `Both players rolled ${whiteDie}; roll again.`, { die: whiteDie });
  }

  const color: Color = whiteDie > blackDie ? "white" : "black";
  return { ok: true, color, roll: makeDiceRoll(whiteDie, blackDie) };
}
