import { describe, it, expect } from "vitest";
import { WorldBuildError } from "@wayfarer/schemas";
import { Bag } from "./bag.js";
import { World } from "./world.js";
import { buildFixtureWorld } from "./testing/fixture-world.js";

describe("World", () => {
  it("registers rooms and items by id", () => {
    const world = buildFixtureWorld();
    expect(world.room("hall")?.name).toBe("Hall");
    expect(world.item("key")?.description).toBe("A small brass key.");
    expect(world.room("attic")).toBeUndefined();
    expect(world.start.id).toBe("hall");
  });

  it("places spawned items in the given room", () => {
    const world = buildFixtureWorld();
    const hall = world.start;
    const key = world.requireItem("key");
    expect(Bag.ownerOf(key)).toBe(hall.items);
  });

  it("builds independent graphs on each call", () => {
    const a = buildFixtureWorld();
    const b = buildFixtureWorld();
    a.inventory.add(a.requireItem("key"));
    expect(b.start.items.has(b.requireItem("key"))).toBe(true);
    expect(a.start.items.has(a.requireItem("key"))).toBe(false);
  });

  it("refuses to seal without a start room", () => {
    const world = new World("empty", "Empty");
    world.addRoom({ id: "void", name: "Void", shortDescription: "Nothing." });
    expect(() => world.seal()).toThrow(WorldBuildError);
  });

  it("freezes the exit graph after seal", () => {
    const world = buildFixtureWorld();
    expect(world.isSealed).toBe(true);
    expect(() => world.connect("hall", "east", "study")).toThrow(/sealed/);
    expect(() => world.addRoom({ id: "attic", name: "Attic", shortDescription: "Dusty." })).toThrow(WorldBuildError);
  });

  it("still spawns items after seal", () => {
    const world = buildFixtureWorld();
    const feather = world.spawn(
      { id: "feather", name: "feather", description: "A feather.", takeable: true, hidden: false },
      world.start
    );
    expect(world.start.findItem("feather")).toBe(feather);
  });

  it("rejects duplicate ids", () => {
    const world = new World("dupes", "Dupes");
    world.addRoom({ id: "a", name: "A", shortDescription: "A." });
    expect(() => world.addRoom({ id: "a", name: "A", shortDescription: "A." })).toThrow(/Duplicate room id/);
    world.addItem({ id: "x", name: "x", description: "X.", takeable: true, hidden: false });
    expect(() => world.addItem({ id: "x", name: "x", description: "X.", takeable: true, hidden: false })).toThrow(/Duplicate item id/);
  });

  it("rejects unknown rooms when connecting", () => {
    const world = new World("w", "W");
    world.addRoom({ id: "a", name: "A", shortDescription: "A." });
    expect(() => world.connect("a", "north", "nowhere")).toThrow(/Unknown room "nowhere"/);
  });

  it("returns an empty passage for an unknown name", () => {
    const world = new World("w", "W");
    world.setPassage("sign", [{ text: "Welcome", style: "header" }]);
    expect(world.passage("sign")).toEqual([{ text: "Welcome", style: "header" }]);
    expect(world.passage("missing")).toEqual([]);
  });
});

describe("World.removeFromPlay", () => {
  it("takes an item out of whichever bag holds it", () => {
    const world = buildFixtureWorld();
    const key = world.requireItem("key");
    world.inventory.add(key);
    world.removeFromPlay(key);
    expect(world.inventory.has(key)).toBe(false);
    expect(world.start.items.has(key)).toBe(false);
    expect(Bag.ownerOf(key)).toBeUndefined();
    expect(world.item("key")).toBe(key);
  });
});
