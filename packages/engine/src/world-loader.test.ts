import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { WorldBuildError } from "@wayfarer/schemas";
import { buildWorld, loadWorldDefinition, parseWorldDefinition } from "./world-loader.js";

const WORLD_YAML = `
id: lighthouse
title: The Lighthouse
start: shore
rooms:
  - id: shore
    name: Shore
    short_description: A pebbled shore.
    long_description: Waves drag at a pebbled shore below a white lighthouse.
    exits:
      up: lamp-room
  - id: lamp-room
    name: Lamp Room
    short_description: A round room around a great lens.
    exits:
      down: shore
items:
  - id: lantern
    name: lantern
    description: A tin lantern.
    takeable: true
    hidden: false
    location: shore
  - id: logbook
    name: logbook
    description: The keeper's logbook.
    takeable: true
    hidden: false
    location: inventory
  - id: lens
    name: lens
    description: A great glass lens.
    takeable: false
    hidden: false
    location: lamp-room
passages:
  logbook:
    - text: "Day 1: the lamp is lit."
      style: system
`;

describe("parseWorldDefinition", () => {
  it("parses a valid definition", () => {
    const def = parseWorldDefinition(WORLD_YAML);
    expect(def.id).toBe("lighthouse");
    expect(def.rooms.map((r) => r.id)).toEqual(["shore", "lamp-room"]);
    expect(def.items).toHaveLength(3);
  });

  it("rejects broken YAML", () => {
    expect(() => parseWorldDefinition("rooms: [", "broken.yaml")).toThrow(/Invalid YAML in world definition "broken.yaml"/);
  });

  it("rejects schema violations with the ajv messages", () => {
    const yaml = WORLD_YAML.replace("    takeable: false\n", "");
    try {
      parseWorldDefinition(yaml, "lighthouse.yaml");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WorldBuildError);
      expect(err).toMatchObject({ code: "WORLD_BUILD_FAILED" });
      expect(String(err)).toContain("/items/2: must have required property 'takeable'");
    }
  });

  it("rejects an unknown start room", () => {
    expect(() => parseWorldDefinition(WORLD_YAML.replace("start: shore", "start: cliff"))).toThrow(
      'Start room "cliff" does not exist'
    );
  });

  it("rejects an exit to an unknown room", () => {
    expect(() => parseWorldDefinition(WORLD_YAML.replace("up: lamp-room", "up: attic"))).toThrow(
      'Exit "up" of room "shore" leads to unknown room "attic"'
    );
  });

  it("rejects an item in an unknown room", () => {
    expect(() => parseWorldDefinition(WORLD_YAML.replace("location: lamp-room", "location: cellar"))).toThrow(
      'Item "lens" is placed in unknown room "cellar"'
    );
  });

  it("rejects duplicate item ids", () => {
    expect(() => parseWorldDefinition(WORLD_YAML.replace("id: lens", "id: lantern"))).toThrow('Duplicate item id "lantern"');
  });
});

describe("buildWorld", () => {
  it("wires rooms, exits, items and passages", () => {
    const world = buildWorld(parseWorldDefinition(WORLD_YAML));
    const shore = world.start;
    expect(shore.id).toBe("shore");
    expect(shore.longDescription).toBe("Waves drag at a pebbled shore below a white lighthouse.");
    expect(shore.exit("up")?.id).toBe("lamp-room");
    expect(shore.findItem("lantern")?.description).toBe("A tin lantern.");
    expect(world.inventory.findByName("logbook")?.id).toBe("logbook");
    expect(world.room("lamp-room")?.findItem("lens")?.takeable).toBe(false);
    expect(world.passage("logbook")).toEqual([{ text: "Day 1: the lamp is lit.", style: "system" }]);
    expect(world.isSealed).toBe(true);
  });

  it("creates new objects on every call", () => {
    const def = parseWorldDefinition(WORLD_YAML);
    const a = buildWorld(def);
    const b = buildWorld(def);
    expect(a.start).not.toBe(b.start);
    expect(a.requireItem("lantern")).not.toBe(b.requireItem("lantern"));
  });
});

describe("loadWorldDefinition", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wayfarer-world-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a definition from disk", async () => {
    const file = join(dir, "lighthouse.yaml");
    await writeFile(file, WORLD_YAML, "utf-8");
    const def = await loadWorldDefinition(file);
    expect(def.title).toBe("The Lighthouse");
  });

  it("fails for a missing file", async () => {
    await expect(loadWorldDefinition(join(dir, "missing.yaml"))).rejects.toThrow(/World definition not found/);
  });
});
