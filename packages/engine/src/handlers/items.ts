import type { GameHandler } from "./types.js";
import { OK, arg, rejected } from "./types.js";

/** Move an item from the current room into the inventory. */
export const take: GameHandler = (ctx, args) => {
  const name = arg(args, "item");
  const item = ctx.room.findItem(name);
  if (!item) {
    ctx.out.emit(`There's no ${name} here.`, "error");
    return rejected("MISSING_REFERENT", name);
  }
  if (!item.takeable) {
    ctx.out.emit(`You can't take the ${name}.`, "error");
    return rejected("NOT_TAKEABLE", name);
  }
  ctx.inventory.add(item);
  ctx.out.emit(`You take the ${item.name}.`, "success");
  return OK;
};

export const drop: GameHandler = (ctx, args) => {
  const name = arg(args, "item");
  const item = ctx.findCarried(name);
  if (!item) {
    ctx.out.emit(`You don't have a ${name}.`, "error");
    return rejected("MISSING_REFERENT", name);
  }
  ctx.room.addItem(item);
  ctx.out.emit(`You drop the ${item.name}.`, "success");
  return OK;
};
