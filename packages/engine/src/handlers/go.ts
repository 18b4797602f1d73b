import type { GameContext } from "../context.js";
import { isCompassDirection, move } from "../movement.js";
import type { Room } from "../room.js";
import type { GameHandler } from "./types.js";
import { OK, arg, rejected } from "./types.js";

/** Put the player in `room`, count the arrival and render it. */
export function enterRoom(ctx: GameContext, room: Room): void {
  ctx.state.currentRoom = room;
  room.markVisited();
  room.describe(ctx.out);
}

/** Bound to each direction literal (`north`, `n`, ...) with a fixed direction. */
export const go: GameHandler = (ctx, args) => {
  const result = move(ctx.room, arg(args, "direction"));
  if (!result.ok) {
    ctx.out.emit(`You can't go ${result.direction}.`, "error");
    return rejected("NO_EXIT", result.direction);
  }
  enterRoom(ctx, result.room);
  ctx.state.incrementTurn();
  return OK;
};

/** `go DIRECTION`: also follows author-invented exit labels. */
export const goDirection: GameHandler = (ctx, args) => {
  const word = arg(args, "direction");
  const result = move(ctx.room, word);
  if (result.ok) {
    enterRoom(ctx, result.room);
    ctx.state.incrementTurn();
    return OK;
  }
  if (isCompassDirection(word)) {
    ctx.out.emit(`You can't go ${result.direction}.`, "error");
  } else {
    ctx.out.emit(`I don't understand which direction '${word}' is.`, "error");
  }
  return rejected("NO_EXIT", result.direction);
};
