import { COMPASS_DIRECTIONS, DIRECTION_ALIASES } from "../movement.js";
import { go, goDirection } from "./go.js";
import { drop, take } from "./items.js";
import { examine, help, look, showInventory } from "./observe.js";
import type { GameGrammar } from "./types.js";
import { use, useOn } from "./use.js";

export { enterRoom } from "./go.js";
export { HELP_ENTRIES } from "./observe.js";
export { OK, rejected, arg } from "./types.js";
export type { GameHandler, GameGrammar } from "./types.js";

/**
 * Register the built-in verbs. The first full match wins, so the targeted
 * `use` forms go before `use ITEM`.
 */
export function registerBuiltins(grammar: GameGrammar): void {
  grammar.register("look", look);
  grammar.registerAll(["inventory", "i"], showInventory);
  grammar.registerAll(["take ITEM", "get ITEM", "pick up ITEM"], take);
  grammar.register("drop ITEM", drop);
  grammar.registerAll(["examine ITEM", "look at ITEM", "inspect ITEM"], examine);
  grammar.registerAll(["use ITEM on TARGET", "use ITEM with TARGET"], useOn);
  grammar.register("use ITEM", use);

  for (const direction of COMPASS_DIRECTIONS) {
    grammar.register(direction, go, { direction });
  }
  for (const [alias, direction] of Object.entries(DIRECTION_ALIASES)) {
    grammar.register(alias, go, { direction });
  }
  grammar.registerAll(["go DIRECTION", "move DIRECTION", "walk DIRECTION"], goDirection);

  grammar.register("help", help);
}
