import type { GameContext } from "./context.js";
import type { Item } from "./item.js";

/**
 * A use-callback. Returns true when the use did something; a false return
 * with no output of its own makes the caller print a generic hint.
 */
export type UseCallback = (ctx: GameContext, item: Item, target: Item | undefined) => boolean;

export type UseKey = { kind: "untargeted" } | { kind: "targeted"; target: Item };

export type UseResolution =
  | { kind: "targeted"; callback: UseCallback }
  | { kind: "untargeted"; callback: UseCallback }
  | { kind: "not_usable" };

/** Per-item table from an optional target identity to a callback. */
export class InteractionTable {
  private untargeted: UseCallback | undefined;
  private targeted = new Map<Item, UseCallback>();

  set(key: UseKey, callback: UseCallback): void {
    if (key.kind === "untargeted") this.untargeted = callback;
    else this.targeted.set(key.target, callback);
  }

  get(key: UseKey): UseCallback | undefined {
    return key.kind === "untargeted" ? this.untargeted : this.targeted.get(key.target);
  }

  /** Exact target identity first, then the untargeted entry whatever the target, else not usable. */
  resolve(target?: Item): UseResolution {
    if (target) {
      const callback = this.targeted.get(target);
      if (callback) return { kind: "targeted", callback };
    }
    if (this.untargeted) return { kind: "untargeted", callback: this.untargeted };
    return { kind: "not_usable" };
  }

  get size(): number {
    return this.targeted.size + (this.untargeted ? 1 : 0);
  }
}

export type UseOutcome = { status: "used"; succeeded: boolean } | { status: "not_usable" };

export function useItem(ctx: GameContext, item: Item, target?: Item): UseOutcome {
  const resolution = item.interactions.resolve(target);
  if (resolution.kind === "not_usable") return { status: "not_usable" };
  return { status: "used", succeeded: resolution.callback(ctx, item, target) };
}
