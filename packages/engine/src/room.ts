import { WorldBuildError } from "@wayfarer/schemas";
import { Bag } from "./bag.js";
import type { Item } from "./item.js";
import type { OutputSink } from "./output.js";

export interface RoomOptions {
  id: string;
  name: string;
  shortDescription: string;
  longDescription?: string;
}

export class Room {
  readonly id: string;
  readonly name: string;
  shortDescription: string;
  longDescription: string;
  firstVisit = true;
  visitCount = 0;
  readonly items = new Bag<Item>();
  private exits = new Map<string, Room>();
  private sealed = false;

  constructor(options: RoomOptions) {
    this.id = options.id;
    this.name = options.name;
    this.shortDescription = options.shortDescription;
    this.longDescription = options.longDescription ?? "";
  }

  /** Add a directed exit. Exits are not made symmetric. */
  connect(direction: string, to: Room): void {
    if (this.sealed) {
      throw new WorldBuildError(`Cannot add exit "${direction}" to sealed room "${this.id}"`, { room: this.id, direction });
    }
    this.exits.set(direction.trim().toLowerCase(), to);
  }

  exit(direction: string): Room | undefined {
    return this.exits.get(direction.trim().toLowerCase());
  }

  /** Direction labels in the order they were connected. */
  get exitDirections(): string[] {
    return [...this.exits.keys()];
  }

  /** Direction of the first exit that leads to `room`, if any. */
  directionTo(room: Room): string | undefined {
    for (const [direction, target] of this.exits) {
      if (target === room) return direction;
    }
    return undefined;
  }

  addItem(item: Item): void {
    this.items.add(item);
  }

  removeItem(item: Item): void {
    this.items.remove(item);
  }

  visibleItems(): Item[] {
    return this.items.toArray().filter((item) => !item.hidden);
  }

  findItem(name: string): Item | undefined {
    return this.items.findByName(name, (item) => !item.hidden);
  }

  addContent(text: string): void {
    if (this.longDescription) this.longDescription += "\n" + text;
    this.shortDescription += "\n" + text;
  }

  markVisited(): void {
    this.visitCount++;
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  describe(out: OutputSink): void {
    out.emit(this.name, "room_name");
    out.emit("=".repeat(this.name.length), "room_name");

    if (this.firstVisit && this.longDescription) {
      out.emit(this.longDescription, "room_desc");
    } else {
      out.emit(this.shortDescription, "room_desc");
    }
    this.firstVisit = false;

    const visible = this.visibleItems();
    if (visible.length > 0) {
      out.emit("You see:", "room_desc");
      for (const item of visible) out.emit(`  ${item.name}`, "item_name");
    }

    const exits = this.exitDirections;
    if (exits.length > 0) out.emit(`Exits: ${exits.join(", ")}`, "room_desc");
  }
}
