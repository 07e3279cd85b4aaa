// src/ui/textClient.ts
//
// Interactive terminal client: reads notation from stdin, rolls dice with
// node:crypto, and prints the board after every action.
//
// Env:
//   BG_FIRST_PLAYER=white|black   skip the opening roll (optional)
//   BG_PERSPECTIVE=mover|white|black   board orientation (default mover)

import readline from "node:readline";
import { randomInt } from "node:crypto";
import type { Color } from "../types";
import { TextController, HELP_LINES, type Perspective } from "./textController";

function parseColor(s: string | undefined): Color | undefined {
  if (s === "white" || s === "black") return s;
  return undefined;
}

function parsePerspective(s: string | undefined): Perspective {
  return parseColor(s) ?? "mover";
}

function print(lines: readonly string[]) {
  for (const line of lines) console.log(line);
}

export function main(): void {
  const firstColor = parseColor(process.env.BG_FIRST_PLAYER);
  const controller = new TextController({
    rollDie: () => randomInt(1, 7),
    firstColor,
    perspective: parsePerspective(process.env.BG_PERSPECTIVE),
  });

  print(HELP_LINES);
  print(firstColor ? controller.render() : controller.openingRoll());

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const prompt = () => {
    rl.setPrompt(controller.prompt());
    rl.prompt();
  };

  rl.on("line", (line) => {
    try {
      print(controller.handleLine(line));
    } catch (err) {
      // Only engine defects land here; user input errors come back as [CODE] lines.
      console.error("Internal error:", err);
      rl.close();
      process.exitCode = 1;
      return;
    }

    if (controller.isFinished()) {
      rl.close();
      return;
    }
    prompt();
  });

  rl.on("close", () => console.log(""));

  prompt();
}

main();
