// src/ui/textController.ts
//
// Line-oriented game loop logic, independent of stdin/stdout.
// Each input line goes in, the lines to print come out.
//
// Commands:
//   <Enter>            roll (when awaiting a roll)
//   roll [a b]         roll, or hand in two dice values
//   <notation>         play a turn, e.g. "8/5 6/5" or "bar/22 13/11"
//   pass               submit an empty turn (only accepted with nothing playable)
//   moves              list single steps available with the remaining dice
//   board              redraw
//   help
//   quit

import type { Color, GameState, Step } from "../types";
import {
  createGame,
  currentColor,
  legalSteps,
  rollDice,
  snapshot,
  startWithOpeningRoll,
  submitTurn,
  type EngineError,
} from "../engine";
import { renderBoard } from "./board/boardText";

export type DieSource = () => number;

export type Perspective = Color | "mover";

export type TextControllerOptions = {
  rollDie: DieSource;
  firstColor?: Color;
  perspective?: Perspective;
};

export function formatError(error: EngineError): string {
  return `[${error.code}] ${error.message}`;
}

export function formatStep(step: Step): string {
  const hit = step.hit ? "*" : "";
  switch (step.kind) {
    case "enter":
      return `bar/${step.to}${hit} (${step.die})`;
    case "normal":
      return `${step.from}/${step.to}${hit} (${step.die})`;
    case "bearOff":
      return `${step.from}/off (${step.die})`;
  }
}

export const HELP_LINES: readonly string[] = [
  "Commands:",
  "  <Enter> | roll [a b]   roll the dice (or hand in two values)",
  "  <notation>             play a turn, e.g. 8/5 6/5 or bar/22 13/11",
  "  pass                   submit an empty turn",
  "  moves                  list single steps for the remaining dice",
  "  board                  redraw the board",
  "  help | quit",
];

export class TextController {
  private state: GameState;
  private readonly rollDie: DieSource;
  private readonly perspective: Perspective;
  private finished = false;

  constructor(opts: TextControllerOptions) {
    this.rollDie = opts.rollDie;
    this.perspective = opts.perspective ?? "mover";
    this.state = createGame({ firstColor: opts.firstColor ?? "white" });
  }

  getState(): GameState {
    return this.state;
  }

  isFinished(): boolean {
    return this.finished || this.state.phase.status === "gameOver";
  }

  /**
   * Opening throw: one die each until they differ; the winner plays both.
   */
  openingRoll(): string[] {
    const out: string[] = [];
    for (;;) {
      const white = this.rollDie();
      const black = this.rollDie();
      const res = startWithOpeningRoll(white, black, this.state.board);
      if (res.ok) {
        this.state = res.state;
        out.push(`Opening roll: white ${white}, black ${black}.`);
        return [...out, ...this.render()];
      }
      if (res.error.code !== "OPENING_ROLL_TIED") return [formatError(res.error)];
      out.push(`Opening roll: both rolled ${white}, rolling again.`);
    }
  }

  render(): string[] {
    const snap = snapshot(this.state);
    const viewer = this.perspective === "mover" ? (snap.currentColor ?? snap.winner ?? "white") : this.perspective;
    return renderBoard(snap, viewer);
  }

  prompt(): string {
    const color = currentColor(this.state);
    if (color === null) return "> ";
    return this.state.phase.status === "awaitingRoll" ? `${color} (Enter to roll)> ` : `${color} to move> `;
  }

  handleLine(raw: string): string[] {
    const line = raw.trim();
    const lower = line.toLowerCase();

    if (lower === "quit" || lower === "q") {
      this.finished = true;
      return ["Bye."];
    }
    if (lower === "help") return [...HELP_LINES];
    if (lower === "board") return this.render();

    const color = currentColor(this.state);
    if (color === null) return ["The game is over."];

    if (this.state.phase.status === "awaitingRoll") {
      if (line === "" || lower === "roll" || lower.startsWith("roll ")) return this.roll(color, lower);
      return [`${color} must roll first (press Enter).`];
    }

    if (lower === "moves") {
      const steps = legalSteps(this.state);
      return steps.length === 0 ? ["No single steps available."] : steps.map(formatStep);
    }
    if (line === "") return [];

    const input = lower === "pass" ? "" : line;
    const res = submitTurn(this.state, color, input);
    if (!res.ok) return [formatError(res.error)];

    this.state = res.state;
    return [`${color} played ${res.record.notation || "(no move)"}.`, ...this.render()];
  }

  private roll(color: Color, lower: string): string[] {
    const args = lower.split(/\s+/).slice(1);
    let a: number;
    let b: number;

    if (args.length === 0) {
      a = this.rollDie();
      b = this.rollDie();
    } else if (args.length === 2) {
      a = Number(args[0]);
      b = Number(args[1]);
    } else {
      return ["Usage: roll [a b]"];
    }

    const res = rollDice(this.state, color, a, b);
    if (!res.ok) return [formatError(res.error)];

    this.state = res.state;
    if (res.forfeited) {
      return [`${color} rolled ${a}-${b}: no legal moves, turn passes.`, ...this.render()];
    }
    return [`${color} rolled ${a}-${b}.`, ...this.render()];
  }
}
