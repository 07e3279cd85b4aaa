// src/engine/validateTurn.ts
//
// Decides whether a whole proposed turn is legal, and what it produces.
// Never mutates its inputs: the resulting board is a new value, and a rejection
// leaves the caller's board exactly as it was.
//
// Per request, in order:
//   1. bar priority        -> MUST_ENTER_FROM_BAR
//   2. origin / direction  -> NO_CHECKER_AT_ORIGIN / WRONG_DIRECTION
//   3. distance vs dice    -> ILLEGAL_DISTANCE
//   4. each landing point  -> BLOCKED_DESTINATION / ILLEGAL_BEAR_OFF
// Then for the turn as a whole: forced use of as many dice as possible -> INCOMPLETE_TURN.

import type { Board, Color, MoveRequest, Step } from "../types";
import { BAR_POINT, HOME_SIZE, OFF_POINT } from "./constants";
import { reject, type Rejected } from "./envelope";
import { formatValues, subtractDice } from "./dice";
import { applyStep } from "./applyStep";
import { forcedHigherDie, maxPlayableDice, stepFor } from "./legalMoves";
import { formatRequest } from "./notation";
import { allInHome, barCount, checkersAt } from "./stateUtils";

export type Accepted = {
  ok: true;
  board: Board;
  steps: Step[];
  consumed: number[];
  remaining: number[];
};

export type TurnDecision = Accepted | Rejected;

type Progress = {
  board: Board;
  dice: number[];
  steps: Step[];
};

/* ---------- DICE PLANS ---------- */

/**
 * Ordered dice sequences that carry one checker exactly `distance` pips.
 * When bearing off, the last die may overshoot. Exact single dice come first,
 * then single overshoots (smallest first), then multi-die chains.
 */
export function dicePlans(dice: readonly number[], distance: number, bearingOff: boolean): number[][] {
  const plans: number[][] = [];
  const seen = new Set<string>();

  const walk = (pool: readonly number[], plan: number[], travelled: number): void => {
    for (const die of [...new Set(pool)]) {
      const total = travelled + die;
      const next = [...plan, die];

      if (total === distance || (bearingOff && total > distance)) {
        const key = next.join(",");
        if (!seen.has(key)) {
          seen.add(key);
          plans.push(next);
        }
        continue;
      }

      if (total < distance) {
        const rest = pool.slice();
        rest.splice(rest.indexOf(die), 1);
        walk(rest, next, total);
      }
    }
  };

  walk(dice, [], 0);

  const rank = (plan: number[]): number => {
    const sum = plan.reduce((a, b) => a + b, 0);
    const overshoot = sum > distance ? 1 : 0;
    return plan.length * 100 + overshoot * 10 + (plan.length === 1 ? plan[0] : 0) / 10;
  };
  return plans.sort((a, b) => rank(a) - rank(b));
}

/* ---------- ONE REQUEST ---------- */

function checkRequest(board: Board, color: Color, dice: readonly number[], req: MoveRequest): { ok: true; plans: number[][] } | Rejected {
  const label = formatRequest(req);
  const from = req.from === "bar" ? BAR_POINT : req.from;
  const to = req.to === "off" ? OFF_POINT : req.to;

  if (barCount(board, color) > 0 && req.from !== "bar") {
    return reject("MUST_ENTER_FROM_BAR", `${color} has a checker on the bar; enter it before moving ${label}.`, {
      request: label,
    });
  }

  const atOrigin = from === BAR_POINT ? barCount(board, color) : checkersAt(board, from, color);
  if (atOrigin === 0) {
    return reject("NO_CHECKER_AT_ORIGIN", `${color} has no checker on ${req.from} for ${label}.`, { request: label });
  }

  if (to >= from) {
    return reject("WRONG_DIRECTION", `${label} moves away from ${color}'s home.`, { request: label });
  }

  // Bearing off from inside home with checkers still outside can never succeed.
  if (to === OFF_POINT && from <= HOME_SIZE && !allInHome(board, color)) {
    return reject("ILLEGAL_BEAR_OFF", `${color} cannot bear off until all checkers are home (${label}).`, {
      request: label,
    });
  }

  const plans = dicePlans(dice, from - to, to === OFF_POINT);
  if (plans.length === 0) {
    return reject(
      "ILLEGAL_DISTANCE",
      `${label} is ${from - to} pips; no combination of the remaining dice (${formatValues(dice)}) fits.`,
      { request: label }
    );
  }

  return { ok: true, plans };
}

function runPlan(p: Progress, color: Color, req: MoveRequest, plan: readonly number[]): Progress | Rejected {
  const label = formatRequest(req);
  let board = p.board;
  let at = req.from === "bar" ? BAR_POINT : req.from;
  const steps: Step[] = [];

  for (const die of plan) {
    if (at !== BAR_POINT && barCount(board, color) > 0) {
      return reject("MUST_ENTER_FROM_BAR", `${color} still has a checker on the bar during ${label}.`, {
        request: label,
        die,
      });
    }

    const step = stepFor(board, color, at, die);
    if (!step) {
      const target = at - die;
      if (target >= 1) {
        return reject("BLOCKED_DESTINATION", `Point ${target} is held by two or more opposing checkers (${label}).`, {
          request: label,
          die,
        });
      }
      return reject(
        "ILLEGAL_BEAR_OFF",
        allInHome(board, color)
          ? `Cannot bear off from ${at} with a ${die} while a checker sits on a higher point (${label}).`
          : `${color} cannot bear off until all checkers are home (${label}).`,
        { request: label, die }
      );
    }

    board = applyStep(board, color, step);
    steps.push(step);
    at = step.kind === "bearOff" ? OFF_POINT : step.to;
  }

  return { board, dice: subtractDice(p.dice, plan).remaining, steps: [...p.steps, ...steps] };
}

/* ---------- WHOLE TURN ---------- */

export function validateTurn(
  board: Board,
  color: Color,
  dice: readonly number[],
  requests: readonly MoveRequest[]
): TurnDecision {
  let maxPlayable: number | undefined;
  const playable = (): number => (maxPlayable ??= maxPlayableDice(board, color, dice));

  const finish = (p: Progress): TurnDecision => {
    const consumed = p.steps.map((s) => s.die);
    const max = playable();

    if (consumed.length < max) {
      return reject(
        "INCOMPLETE_TURN",
        `Turn plays ${consumed.length} of the dice (${formatValues(dice)}) but ${max} can be played.`
      );
    }

    const higher = forcedHigherDie(board, color, dice, max);
    if (higher !== null && consumed[0] !== higher) {
      return reject("INCOMPLETE_TURN", `Only one die can be played, so it must be the ${higher}.`, { die: higher });
    }

    return { ok: true, board: p.board, steps: p.steps, consumed, remaining: p.dice };
  };

  const search = (p: Progress, i: number): TurnDecision => {
    if (i === requests.length) return finish(p);

    const req = requests[i];
    const checked = checkRequest(p.board, color, p.dice, req);
    if (!checked.ok) return checked;

    let firstError: Rejected | undefined;
    for (const plan of checked.plans) {
      const ran = runPlan(p, color, req, plan);
      if ("ok" in ran) {
        firstError ??= ran;
        continue;
      }

      const rest = search(ran, i + 1);
      if (rest.ok) return rest;
      firstError ??= rest;
    }

    // checkRequest guarantees at least one plan, so an error was recorded.
    return firstError ?? reject("ILLEGAL_DISTANCE", `No dice plan for ${formatRequest(req)}.`);
  };

  return search({ board, dice: dice.slice(), steps: [] }, 0);
}
