import { describe, it, expect } from "vitest";
import { v4 as uuid } from "uuid";
import { validateWorldDefinitionData, validateJournalEventData } from "./validator.js";
import { WayfarerError, ErrorCodes, isStyleTag } from "./types.js";
import type { WorldDefinition } from "./types.js";

describe("validateWorldDefinitionData", () => {
  const validWorld = (): WorldDefinition => ({
    id: "test-world",
    title: "Test World",
    start: "hall",
    rooms: [
      {
        id: "hall",
        name: "Hall",
        short_description: "A bare hall.",
        long_description: "A long, bare hall with a tiled floor.",
        exits: { north: "study" },
      },
      { id: "study", name: "Study", short_description: "A cramped study.", exits: { south: "hall" } },
    ],
    items: [
      { id: "lamp", name: "lamp", description: "A brass lamp.", takeable: true, hidden: false, location: "hall" },
    ],
    passages: {
      note: [{ text: "Hello there.", style: "system" }],
    },
  });

  it("accepts a valid world", () => {
    const result = validateWorldDefinitionData(validWorld());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("rejects a world missing required fields", () => {
    const result = validateWorldDefinitionData({ id: "x" });
    expect(result.valid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
  });

  it("rejects an item without an explicit takeable flag", () => {
    const world = validWorld();
    const { takeable: _dropped, ...item } = world.items[0]!;
    const result = validateWorldDefinitionData({ ...world, items: [item] });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/items/0: must have required property 'takeable'");
  });

  it("rejects an item without an explicit hidden flag", () => {
    const world = validWorld();
    const { hidden: _dropped, ...item } = world.items[0]!;
    const result = validateWorldDefinitionData({ ...world, items: [item] });
    expect(result.valid).toBe(false);
  });

  it("rejects a world with no rooms", () => {
    const result = validateWorldDefinitionData({ ...validWorld(), rooms: [] });
    expect(result.valid).toBe(false);
  });

  it("rejects an unknown passage style", () => {
    const world = { ...validWorld(), passages: { note: [{ text: "Hi", style: "shout" }] } };
    const result = validateWorldDefinitionData(world);
    expect(result.valid).toBe(false);
  });

  it("rejects upper-case room ids", () => {
    const world = validWorld();
    world.rooms[0]!.id = "Hall";
    const result = validateWorldDefinitionData(world);
    expect(result.valid).toBe(false);
  });

  it("rejects additional properties on rooms", () => {
    const world = validWorld();
    const result = validateWorldDefinitionData({
      ...world,
      rooms: [{ ...world.rooms[0], lighting: "dim" }, world.rooms[1]],
    });
    expect(result.valid).toBe(false);
  });

  it("accepts author-invented direction labels", () => {
    const world = validWorld();
    world.rooms[0]!.exits = { north: "study", "through the curtain": "study" };
    expect(validateWorldDefinitionData(world).valid).toBe(true);
  });
});

describe("validateJournalEventData", () => {
  const validEvent = () => ({
    event_id: uuid(),
    timestamp: new Date().toISOString(),
    session_id: uuid(),
    type: "turn.completed",
    payload: { input: "look" },
    seq: 0,
  });

  it("accepts a valid event", () => {
    expect(validateJournalEventData(validEvent()).valid).toBe(true);
  });

  it("rejects an unknown event type", () => {
    const result = validateJournalEventData({ ...validEvent(), type: "turn.exploded" });
    expect(result.valid).toBe(false);
  });

  it("rejects a malformed timestamp", () => {
    const result = validateJournalEventData({ ...validEvent(), timestamp: "yesterday" });
    expect(result.valid).toBe(false);
  });

  it("rejects a negative sequence number", () => {
    const result = validateJournalEventData({ ...validEvent(), seq: -1 });
    expect(result.valid).toBe(false);
  });
});

describe("WayfarerError", () => {
  it("has correct code, message, and data", () => {
    const err = new WayfarerError("WORLD_BUILD_FAILED", "no start room", { world: "museum" });
    expect(err.code).toBe(ErrorCodes.WORLD_BUILD_FAILED);
    expect(err.message).toBe("no start room");
    expect(err.data).toEqual({ world: "museum" });
    expect(err.name).toBe("WayfarerError");
    expect(err instanceof Error).toBe(true);
  });

  it("works without data parameter", () => {
    const err = new WayfarerError("SESSION_NOT_FOUND", "gone");
    expect(err.code).toBe("SESSION_NOT_FOUND");
    expect(err.data).toBeUndefined();
  });
});

describe("isStyleTag", () => {
  it("recognises every output style", () => {
    for (const tag of ["room_name", "item_desc", "speech", "header"]) {
      expect(isStyleTag(tag)).toBe(true);
    }
  });

  it("rejects unknown styles", () => {
    expect(isStyleTag("bold")).toBe(false);
  });
});
