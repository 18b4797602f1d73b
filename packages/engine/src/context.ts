import { WayfarerError } from "@wayfarer/schemas";
import type { Logger } from "@wayfarer/schemas";
import type { Bag } from "./bag.js";
import type { GameState } from "./game-state.js";
import type { Item } from "./item.js";
import type { OutputSink } from "./output.js";
import type { Room } from "./room.js";
import type { World } from "./world.js";

export interface GameContextInit {
  state: GameState;
  inventory: Bag<Item>;
  world: World;
  out: OutputSink;
  logger: Logger;
}

/** Everything a handler or use-callback may touch. Passed explicitly on every call. */
export class GameContext {
  readonly state: GameState;
  readonly inventory: Bag<Item>;
  readonly world: World;
  readonly out: OutputSink;
  readonly logger: Logger;

  constructor(init: GameContextInit) {
    this.state = init.state;
    this.inventory = init.inventory;
    this.world = init.world;
    this.out = init.out;
    this.logger = init.logger;
  }

  /** Same session, different output sink. */
  withOutput(out: OutputSink): GameContext {
    return new GameContext({ state: this.state, inventory: this.inventory, world: this.world, out, logger: this.logger });
  }

  /** The player's current room. Throws before the session has started. */
  get room(): Room {
    const room = this.state.currentRoom;
    if (!room) throw new WayfarerError("HANDLER_FAILED", "No current room: the session has not started");
    return room;
  }

  /** Print a named passage from the world's content. */
  passage(name: string): void {
    for (const line of this.world.passage(name)) this.out.emit(line.text, line.style);
  }

  carrying(item: Item): boolean {
    return this.inventory.has(item);
  }

  /** A visible item in the current room, then in the inventory. */
  findNearby(name: string): Item | undefined {
    return this.room.findItem(name) ?? this.findCarried(name);
  }

  findCarried(name: string): Item | undefined {
    return this.inventory.findByName(name, (item) => !item.hidden);
  }
}
