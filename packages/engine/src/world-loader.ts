import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { WorldBuildError, checkWorldDefinition } from "@wayfarer/schemas";
import type { WorldDefinition } from "@wayfarer/schemas";
import { World } from "./world.js";

export const INVENTORY_LOCATION = "inventory";

/** Parse and validate world YAML. Throws WorldBuildError on syntax or schema errors. */
export function parseWorldDefinition(content: string, source = "<inline>"): WorldDefinition {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (err) {
    throw new WorldBuildError(`Invalid YAML in world definition "${source}": ${err instanceof Error ? err.message : String(err)}`, { source });
  }
  const check = checkWorldDefinition(data);
  if (!check.valid) {
    throw new WorldBuildError(`Invalid world definition "${source}": ${check.errors.join(", ")}`, { source, errors: check.errors });
  }
  assertReferences(check.value);
  return check.value;
}

export async function loadWorldDefinition(filePath: string): Promise<WorldDefinition> {
  if (!existsSync(filePath)) throw new WorldBuildError(`World definition not found: ${filePath}`, { source: filePath });
  const content = await readFile(filePath, "utf-8");
  return parseWorldDefinition(content, filePath);
}

/**
 * Instantiate a sealed World from a definition. Every call creates new Room
 * and Item objects, so sessions never share a graph.
 */
export function buildWorld(def: WorldDefinition): World {
  const world = new World(def.id, def.title);

  for (const room of def.rooms) {
    world.addRoom({
      id: room.id,
      name: room.name,
      shortDescription: room.short_description,
      ...(room.long_description !== undefined ? { longDescription: room.long_description } : {}),
    });
  }
  for (const room of def.rooms) {
    for (const [direction, to] of Object.entries(room.exits)) {
      world.connect(room.id, direction, to);
    }
  }
  for (const item of def.items) {
    const { location, ...options } = item;
    const into = location === INVENTORY_LOCATION ? world.inventory : world.room(location);
    if (!into) throw new WorldBuildError(`Item "${item.id}" is placed in unknown room "${location}"`, { world: def.id, item: item.id });
    world.spawn(options, into);
  }
  for (const [name, lines] of Object.entries(def.passages ?? {})) {
    world.setPassage(name, lines.map((line) => ({ ...line })));
  }

  world.setStart(def.start);
  world.seal();
  return world;
}

function assertReferences(def: WorldDefinition): void {
  const roomIds = new Set<string>();
  for (const room of def.rooms) {
    if (roomIds.has(room.id)) throw new WorldBuildError(`Duplicate room id "${room.id}"`, { world: def.id, room: room.id });
    roomIds.add(room.id);
  }
  if (!roomIds.has(def.start)) {
    throw new WorldBuildError(`Start room "${def.start}" does not exist`, { world: def.id, start: def.start });
  }
  for (const room of def.rooms) {
    for (const [direction, to] of Object.entries(room.exits)) {
      if (!roomIds.has(to)) {
        throw new WorldBuildError(`Exit "${direction}" of room "${room.id}" leads to unknown room "${to}"`, { world: def.id, room: room.id });
      }
    }
  }
  const itemIds = new Set<string>();
  for (const item of def.items) {
    if (itemIds.has(item.id)) throw new WorldBuildError(`Duplicate item id "${item.id}"`, { world: def.id, item: item.id });
    itemIds.add(item.id);
    if (item.location !== INVENTORY_LOCATION && !roomIds.has(item.location)) {
      throw new WorldBuildError(`Item "${item.id}" is placed in unknown room "${item.location}"`, { world: def.id, item: item.id });
    }
  }
}
