// src/engine/notation.ts
//
// Standard move notation, always read from the mover's perspective:
//   <move> ::= <stop> ("/" <stop>)+
//   <stop> ::= 1..24 | "bar" | "off"
// A turn is one or more moves separated by whitespace. "8/3/1" is one checker
// travelling 8 -> 3 -> 1, "8/3 6/1" is two checkers.

import type { Destination, MoveRequest, Origin } from "../types";
import { isBoardPoint } from "./constants";
import { reject, type Rejected } from "./envelope";

export type ParseResult = { ok: true; requests: MoveRequest[] } | Rejected;

type Stop = number | "bar" | "off";

const POINT_TOKEN = /^(\d+)\*?$/;
const WORD_TOKEN = /^[a-z]+$/i;

function parseStop(token: string, group: string, position: number, last: number): { ok: true; stop: Stop } | Rejected {
  if (token === "") {
    return reject("MALFORMED_NOTATION", `Empty stop in "${group}".`, { request: group });
  }

  const num = POINT_TOKEN.exec(token);
  if (num) {
    const point = Number(num[1]);
    if (!isBoardPoint(point)) {
      return reject("INVALID_POINT", `Point ${num[1]} in "${group}" is outside 1-24.`, { request: group });
    }
    return { ok: true, stop: point };
  }

  if (WORD_TOKEN.test(token)) {
    const word = token.toLowerCase();
    if (word === "bar" && position === 0) return { ok: true, stop: "bar" };
    if (word === "off" && position === last) return { ok: true, stop: "off" };

    const hint =
      word === "bar"
        ? "bar can only start a move"
        : word === "off"
          ? "off can only end a move"
          : "expected bar or off";
    return reject("INVALID_KEYWORD", `"${token}" in "${group}": ${hint}.`, { request: group });
  }

  return reject("MALFORMED_NOTATION", `Cannot read "${token}" in "${group}".`, { request: group });
}

function parseGroup(group: string, chain: number): { ok: true; requests: MoveRequest[] } | Rejected {
  const tokens = group.split("/");
  if (tokens.length < 2) {
    return reject("MALFORMED_NOTATION", `"${group}" needs at least two stops (e.g. 8/5).`, { request: group });
  }

  const last = tokens.length - 1;
  const origins: Origin[] = [];
  const destinations: Destination[] = [];

  for (let i = 0; i <= last; i++) {
    const parsed = parseStop(tokens[i], group, i, last);
    if (!parsed.ok) return parsed;

    const stop = parsed.stop;
    // parseStop only yields "bar" at position 0 and "off" at the last position.
    if (i < last && stop !== "off") origins.push(stop);
    if (i > 0 && stop !== "bar") destinations.push(stop);
  }

  const requests = origins.map((from, hop) => ({ from, to: destinations[hop], chain, hop }));
  return { ok: true, requests };
}

export function parseNotation(input: string): ParseResult {
  const groups = input.trim().split(/\s+/).filter((g) => g.length > 0);
  if (groups.length === 0) {
    return reject("MALFORMED_NOTATION", "No moves given.");
  }

  const requests: MoveRequest[] = [];
  for (let chain = 0; chain < groups.length; chain++) {
    const parsed = parseGroup(groups[chain], chain);
    if (!parsed.ok) return parsed;
    requests.push(...parsed.requests);
  }

  return { ok: true, requests };
}

export function formatRequest(request: Pick<MoveRequest, "from" | "to">): string {
  return `${request.from}/${request.to}`;
}

/**
 * Render requests back to notation, re-joining hops that share a chain.
 */
export function formatRequests(requests: readonly MoveRequest[]): string {
  const out: string[] = [];
  let prev: MoveRequest | undefined;

  for (const r of requests) {
    if (prev && prev.chain === r.chain && prev.to === r.from) {
      out[out.length - 1] += `/${r.to}`;
    } else {
      out.push(formatRequest(r));
    }
    prev = r;
  }

  return out.join(" ");
}
