import { WorldBuildError } from "@wayfarer/schemas";
import type { PassageLine } from "@wayfarer/schemas";
import { Bag } from "./bag.js";
import { Item } from "./item.js";
import type { ItemOptions } from "./item.js";
import { Room } from "./room.js";
import type { RoomOptions } from "./room.js";

/**
 * Registry of one session's rooms and items. Built once, then sealed:
 * after `seal()` the exit graph is fixed while items keep moving between bags.
 */
export class World {
  readonly id: string;
  readonly title: string;
  /** The player's inventory. Owned by the world so a rebuilt world starts empty-handed. */
  readonly inventory = new Bag<Item>();
  private rooms = new Map<string, Room>();
  private items = new Map<string, Item>();
  private passages = new Map<string, PassageLine[]>();
  private startRoom: Room | undefined;
  private sealed = false;

  constructor(id: string, title: string) {
    this.id = id;
    this.title = title;
  }

  addRoom(options: RoomOptions): Room {
    this.assertOpen();
    if (this.rooms.has(options.id)) {
      throw new WorldBuildError(`Duplicate room id "${options.id}"`, { world: this.id, room: options.id });
    }
    const room = new Room(options);
    this.rooms.set(room.id, room);
    return room;
  }

  /** Register an item without placing it. Items can still be registered after seal. */
  addItem(options: ItemOptions): Item {
    if (this.items.has(options.id)) {
      throw new WorldBuildError(`Duplicate item id "${options.id}"`, { world: this.id, item: options.id });
    }
    const item = new Item(options);
    this.items.set(item.id, item);
    return item;
  }

  /** Create an item and put it straight into a room or bag. */
  spawn(options: ItemOptions, into: Room | Bag<Item>): Item {
    const item = this.addItem(options);
    if (into instanceof Room) into.addItem(item);
    else into.add(item);
    return item;
  }

  /** Take an item out of play: it leaves whichever bag holds it. It stays registered by id. */
  removeFromPlay(item: Item): void {
    Bag.ownerOf(item)?.remove(item);
  }

  connect(from: Room | string, direction: string, to: Room | string): void {
    this.assertOpen();
    this.resolveRoom(from).connect(direction, this.resolveRoom(to));
  }

  setStart(room: Room | string): void {
    this.startRoom = this.resolveRoom(room);
  }

  get start(): Room {
    if (!this.startRoom) {
      throw new WorldBuildError(`World "${this.id}" has no start room`, { world: this.id });
    }
    return this.startRoom;
  }

  room(id: string): Room | undefined {
    return this.rooms.get(id);
  }

  item(id: string): Item | undefined {
    return this.items.get(id);
  }

  requireItem(id: string): Item {
    const item = this.items.get(id);
    if (!item) throw new WorldBuildError(`Unknown item "${id}"`, { world: this.id, item: id });
    return item;
  }

  allRooms(): Room[] {
    return [...this.rooms.values()];
  }

  allItems(): Item[] {
    return [...this.items.values()];
  }

  setPassage(name: string, lines: PassageLine[]): void {
    this.passages.set(name, lines);
  }

  passage(name: string): PassageLine[] {
    return this.passages.get(name) ?? [];
  }

  seal(): void {
    if (!this.startRoom) {
      throw new WorldBuildError(`World "${this.id}" has no start room`, { world: this.id });
    }
    for (const room of this.rooms.values()) room.seal();
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private resolveRoom(ref: Room | string): Room {
    if (typeof ref !== "string") return ref;
    const room = this.rooms.get(ref);
    if (!room) throw new WorldBuildError(`Unknown room "${ref}"`, { world: this.id, room: ref });
    return room;
  }

  private assertOpen(): void {
    if (this.sealed) throw new WorldBuildError(`World "${this.id}" is sealed`, { world: this.id });
  }
}
