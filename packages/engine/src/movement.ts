import type { Room } from "./room.js";

export const COMPASS_DIRECTIONS = ["north", "south", "east", "west", "up", "down"] as const;

export const DIRECTION_ALIASES: Readonly<Record<string, string>> = {
  n: "north",
  s: "south",
  e: "east",
  w: "west",
  u: "up",
  d: "down",
};

/** Expand a one-letter shortcut; any other word passes through so authors can invent directions. */
export function normalizeDirection(word: string): string {
  const lowered = word.trim().toLowerCase();
  return DIRECTION_ALIASES[lowered] ?? lowered;
}

export function isCompassDirection(word: string): boolean {
  return (COMPASS_DIRECTIONS as readonly string[]).includes(normalizeDirection(word));
}

export type MoveResult =
  | { ok: true; room: Room; direction: string }
  | { ok: false; code: "NO_EXIT"; direction: string };

/** Pure lookup on the room graph. The caller applies the move. */
export function move(room: Room, direction: string): MoveResult {
  const normalized = normalizeDirection(direction);
  const target = room.exit(normalized);
  return target
    ? { ok: true, room: target, direction: normalized }
    : { ok: false, code: "NO_EXIT", direction: normalized };
}
