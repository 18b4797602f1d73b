import { describe, it, expect } from "vitest";
import { Bag } from "./bag.js";
import { Item } from "./item.js";

function item(name: string, hidden = false): Item {
  return new Item({ id: name.replace(/\s+/g, "-"), name, description: `A ${name}.`, takeable: true, hidden });
}

describe("Bag", () => {
  it("adds and removes by identity", () => {
    const bag = new Bag<Item>();
    const key = item("key");
    bag.add(key);
    expect(bag.has(key)).toBe(true);
    expect(bag.size).toBe(1);
    bag.remove(key);
    expect(bag.has(key)).toBe(false);
    expect(bag.size).toBe(0);
  });

  it("ignores removal of an absent item", () => {
    const bag = new Bag<Item>();
    const other = new Bag<Item>();
    const key = item("key");
    other.add(key);
    bag.remove(key);
    expect(other.has(key)).toBe(true);
    expect(Bag.ownerOf(key)).toBe(other);
  });

  it("moves an item out of its previous bag on add", () => {
    const room = new Bag<Item>();
    const inventory = new Bag<Item>();
    const key = item("key");
    room.add(key);
    inventory.add(key);
    expect(room.has(key)).toBe(false);
    expect(inventory.has(key)).toBe(true);
    expect(Bag.ownerOf(key)).toBe(inventory);
  });

  it("keeps a single copy when the same item is added twice", () => {
    const bag = new Bag<Item>();
    const key = item("key");
    bag.add(key);
    bag.add(key);
    expect(bag.size).toBe(1);
  });

  it("clears the owner when an item is removed", () => {
    const bag = new Bag<Item>();
    const key = item("key");
    bag.add(key);
    bag.remove(key);
    expect(Bag.ownerOf(key)).toBeUndefined();
  });

  it("finds by name case-insensitively, first match in insertion order", () => {
    const bag = new Bag<Item>();
    const first = new Item({ id: "map-1", name: "map", description: "First map.", takeable: true, hidden: false });
    const second = new Item({ id: "map-2", name: "Map", description: "Second map.", takeable: true, hidden: false });
    bag.add(first);
    bag.add(second);
    expect(bag.findByName("MAP")).toBe(first);
    expect(bag.findByName(" map ")).toBe(first);
    expect(bag.findByName("compass")).toBeUndefined();
  });

  it("matches multi-word names", () => {
    const bag = new Bag<Item>();
    const candy = item("cotton candy");
    bag.add(candy);
    expect(bag.findByName("cotton candy")).toBe(candy);
  });

  it("applies a lookup filter", () => {
    const bag = new Bag<Item>();
    const hidden = item("coin", true);
    const visible = new Item({ id: "coin-2", name: "coin", description: "A coin.", takeable: true, hidden: false });
    bag.add(hidden);
    bag.add(visible);
    expect(bag.findByName("coin", (i) => !i.hidden)).toBe(visible);
  });

  it("iterates in insertion order", () => {
    const bag = new Bag<Item>();
    const names = ["sign", "map", "compass"];
    for (const name of names) bag.add(item(name));
    expect([...bag].map((i) => i.name)).toEqual(names);
    expect(bag.toArray().map((i) => i.name)).toEqual(names);
  });
});
