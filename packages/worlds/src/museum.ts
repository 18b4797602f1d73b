import type { WorldDefinition } from "@wayfarer/schemas";
import { buildWorld, loadWorldDefinition, rejected, OK } from "@wayfarer/engine";
import type { GameContext, GameGrammar, Item, World, WorldModule } from "@wayfarer/engine";
import { dataFile } from "./data-files.js";

export const MUSEUM_FILE = dataFile("museum.yaml");

const ENTRANCE = "entrance";
const CHAMBER = "interactions";

function readPassage(name: string) {
  return (ctx: GameContext): boolean => {
    ctx.passage(name);
    return true;
  };
}

function showMap(ctx: GameContext): boolean {
  ctx.passage("map");
  ctx.out.emit(`You are currently in the ${ctx.room.name}.`, "hint");
  return true;
}

function checkCompass(ctx: GameContext): boolean {
  ctx.out.emit("You check the compass...", "command");
  const entrance = ctx.world.room(ENTRANCE);
  const direction = entrance ? ctx.room.directionTo(entrance) : undefined;
  if (direction) {
    ctx.out.emit(`The needle points ${direction}, toward the Museum Entrance.`, "success");
  } else {
    ctx.out.emit("The needle spins around and points south, indicating the Museum Entrance is that way.", "success");
  }
  return true;
}

/** Empties the pouch once: three small items land on the floor and the pouch is gone. */
function openCollection(ctx: GameContext, collection: Item): boolean {
  ctx.out.emit("You open the sample collection pouch...", "command");
  ctx.out.emit("Inside are several tiny labeled items: a coin, a button, and a marble.", "success");
  ctx.out.emit("This is perfect for practicing inventory management!", "success");

  if (ctx.state.getFlag("sample_collection_used")) {
    ctx.out.emit("You've already removed the items from the pouch.", "hint");
    return true;
  }

  const room = ctx.room;
  ctx.world.spawn({ id: "coin", name: "coin", description: "A small gold coin with the museum's logo.", takeable: true, hidden: false }, room);
  ctx.world.spawn({ id: "button", name: "button", description: "A decorative button made of polished wood.", takeable: true, hidden: false }, room);
  ctx.world.spawn({ id: "marble", name: "marble", description: "A glass marble with swirling colors inside.", takeable: true, hidden: false }, room);
  ctx.world.removeFromPlay(collection);
  ctx.state.setFlag("sample_collection_used");

  ctx.out.emit("You emptied the pouch, placing the items on the floor.", "success");
  return true;
}

function unlockCase(ctx: GameContext, _key: Item, target: Item | undefined): boolean {
  ctx.out.emit("You insert the key into the locked case...", "command");

  if (ctx.room.id !== CHAMBER || !target) {
    ctx.out.emit("There's no case here to unlock.", "error");
    return false;
  }
  if (ctx.state.getFlag("case_unlocked")) {
    ctx.out.emit("The case is already unlocked.", "hint");
    return true;
  }

  ctx.out.emit("The key fits perfectly! You turn it and the case unlocks with a satisfying click.", "success");
  ctx.out.emit("Inside the case is a beautiful golden badge that reads 'Expert Adventurer'.", "success");
  ctx.world.spawn(
    {
      id: "badge",
      name: "badge",
      description: "A golden 'Expert Adventurer' badge. Wearing it shows you understand item interactions.",
      takeable: true,
      hidden: false,
    },
    ctx.room
  );
  target.description = "An unlocked display case that previously held a badge.";
  ctx.state.setFlag("case_unlocked");
  return true;
}

function writeInNotebook(ctx: GameContext, notebook: Item): boolean {
  ctx.out.emit("You open the notebook and see blank pages ready for your game ideas.", "command");
  ctx.out.emit("This would be perfect for sketching out room layouts or writing item descriptions.", "success");
  if (ctx.carrying(notebook)) {
    ctx.passage("notebook-sketch");
    notebook.description = "A notebook with your game ideas sketched inside.";
  }
  return true;
}

export function attachMuseumCallbacks(world: World): void {
  world.requireItem("sign").addUseCallback(readPassage("sign"));
  world.requireItem("map").addUseCallback(showMap);
  world.requireItem("guide").addUseCallback(readPassage("movement-guide"));
  world.requireItem("compass").addUseCallback(checkCompass);
  world.requireItem("plaque").addUseCallback(readPassage("plaque"));
  world.requireItem("collection").addUseCallback(openCollection);
  world.requireItem("display").addUseCallback(readPassage("display"));
  world.requireItem("manual").addUseCallback(readPassage("manual"));
  world.requireItem("notebook").addUseCallback(writeInNotebook);
  world.requireItem("key").addUseCallback(unlockCase, world.requireItem("case"));
}

export function installMuseumCommands(grammar: GameGrammar): void {
  grammar.registerAll(["talk to curator", "speak to curator"], (ctx) => {
    if (!ctx.room.name.startsWith("Museum")) {
      ctx.out.emit("There's no curator here.", "error");
      return rejected("MISSING_REFERENT", "curator");
    }
    ctx.passage("curator");
    return OK;
  });
}

export function createMuseumModule(def: WorldDefinition): WorldModule {
  return {
    id: def.id,
    title: def.title,
    description: def.description,
    build() {
      const world = buildWorld(def);
      attachMuseumCallbacks(world);
      return world;
    },
    install: installMuseumCommands,
  };
}

export async function loadMuseum(filePath: string = MUSEUM_FILE): Promise<WorldModule> {
  return createMuseumModule(await loadWorldDefinition(filePath));
}
