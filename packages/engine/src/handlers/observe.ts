import type { GameHandler } from "./types.js";
import { OK, arg, rejected } from "./types.js";

export const look: GameHandler = (ctx) => {
  ctx.room.describe(ctx.out);
  return OK;
};

export const showInventory: GameHandler = (ctx) => {
  const carried = ctx.inventory.toArray().filter((item) => !item.hidden);
  if (carried.length === 0) {
    ctx.out.emit("You're not carrying anything.", "hint");
    return OK;
  }
  ctx.out.emit("You're carrying:", "command");
  for (const item of carried) ctx.out.emit(`  ${item.name}`, "item_name");
  return OK;
};

export const examine: GameHandler = (ctx, args) => {
  const name = arg(args, "item");
  const item = ctx.findNearby(name);
  if (!item) {
    ctx.out.emit(`You don't see a ${name} here.`, "error");
    return rejected("MISSING_REFERENT", name);
  }
  ctx.out.emit(item.description, "item_desc");
  return OK;
};

export const HELP_ENTRIES: ReadonlyArray<readonly [string, string]> = [
  ["look", "Look around the current location"],
  ["go [direction]", "Move in a direction (north, south, east, west, etc.)"],
  ["take [item]", "Pick up an item"],
  ["drop [item]", "Drop an item from your inventory"],
  ["inventory", "View your inventory (shortcut: 'i')"],
  ["examine [item]", "Look at an item in detail"],
  ["use [item]", "Use an item"],
  ["use [item] on/with [target]", "Use an item on a target"],
  ["help", "Show this help message"],
  ["quit", "Exit the game"],
];

export const help: GameHandler = (ctx) => {
  ctx.out.emit("AVAILABLE COMMANDS", "header");
  for (const [command, description] of HELP_ENTRIES) {
    ctx.out.emit(`${command}: ${description}`, "command");
  }
  return OK;
};
