import type { StyleTag } from "@wayfarer/schemas";
import type { GameContext } from "../context.js";
import { useItem } from "../interaction.js";
import type { Item } from "../item.js";
import type { OutputSink } from "../output.js";
import type { GameHandler } from "./types.js";
import { OK, arg, rejected } from "./types.js";

class CountingSink implements OutputSink {
  count = 0;
  constructor(private inner: OutputSink) {}

  emit(text: string, style: StyleTag): void {
    this.count++;
    this.inner.emit(text, style);
  }
}

function runUse(ctx: GameContext, item: Item, target?: Item): ReturnType<GameHandler> {
  const sink = new CountingSink(ctx.out);
  const scoped = ctx.withOutput(sink);
  const outcome = useItem(scoped, item, target);
  if (outcome.status === "not_usable") {
    ctx.out.emit(`You're not sure how to use the ${item.name}.`, "error");
    return rejected("NOT_USABLE", item.name);
  }
  if (!outcome.succeeded) {
    if (sink.count === 0) ctx.out.emit("Nothing happens.", "hint");
    return rejected("NOT_USABLE", item.name);
  }
  return OK;
}

/** Carried items win over same-named ones in the room, so fixtures like signs stay usable. */
function findUsable(ctx: GameContext, name: string): Item | undefined {
  return ctx.findCarried(name) ?? ctx.room.findItem(name);
}

export const use: GameHandler = (ctx, args) => {
  const name = arg(args, "item");
  const item = findUsable(ctx, name);
  if (!item) {
    ctx.out.emit(`You don't see a ${name} here.`, "error");
    return rejected("MISSING_REFERENT", name);
  }
  return runUse(ctx, item);
};

export const useOn: GameHandler = (ctx, args) => {
  const name = arg(args, "item");
  const targetName = arg(args, "target");
  const item = findUsable(ctx, name);
  if (!item) {
    ctx.out.emit(`You don't see a ${name} here.`, "error");
    return rejected("MISSING_REFERENT", name);
  }
  const target = ctx.findNearby(targetName);
  if (!target) {
    ctx.out.emit(`You don't see a ${targetName} here.`, "error");
    return rejected("MISSING_REFERENT", targetName);
  }
  return runUse(ctx, item, target);
};
