import { InteractionTable } from "./interaction.js";
import type { UseCallback } from "./interaction.js";

export interface ItemOptions {
  id: string;
  name: string;
  description: string;
  takeable: boolean;
  hidden: boolean;
}

export class Item {
  readonly id: string;
  readonly name: string;
  description: string;
  takeable: boolean;
  /** Hidden items stay in their Bag but are left out of listings and name lookups. */
  hidden: boolean;
  readonly interactions = new InteractionTable();

  constructor(options: ItemOptions) {
    this.id = options.id;
    this.name = options.name;
    this.description = options.description;
    this.takeable = options.takeable;
    this.hidden = options.hidden;
  }

  /** Insert or overwrite the callback for `target`, or the untargeted one when no target is given. */
  addUseCallback(callback: UseCallback, target?: Item): void {
    this.interactions.set(target ? { kind: "targeted", target } : { kind: "untargeted" }, callback);
  }

  toString(): string {
    return this.name;
  }
}
