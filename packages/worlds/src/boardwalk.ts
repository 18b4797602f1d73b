import type { WorldDefinition } from "@wayfarer/schemas";
import { arg, buildWorld, loadWorldDefinition, rejected, OK } from "@wayfarer/engine";
import type { GameContext, GameGrammar, Item, World, WorldModule } from "@wayfarer/engine";
import { dataFile } from "./data-files.js";

export const BOARDWALK_FILE = dataFile("boardwalk.yaml");

function readPassage(name: string) {
  return (ctx: GameContext): boolean => {
    ctx.passage(name);
    return true;
  };
}

function eatCottonCandy(ctx: GameContext, candy: Item): boolean {
  ctx.passage("cotton-candy");
  ctx.world.removeFromPlay(candy);
  return true;
}

export function attachBoardwalkCallbacks(world: World): void {
  world.requireItem("pamphlet").addUseCallback(readPassage("pamphlet"));
  world.requireItem("cotton-candy").addUseCallback(eatCottonCandy);
  world.requireItem("map").addUseCallback(readPassage("map"));
}

/** NPCs are fixed items in the room; their dialogue is the passage named after the item id. */
export function installBoardwalkCommands(grammar: GameGrammar): void {
  grammar.registerAll(["talk to PERSON", "speak to PERSON", "ask PERSON"], (ctx, args) => {
    const person = arg(args, "person");
    const npc = ctx.room.findItem(person);
    if (!npc || npc.takeable) {
      ctx.out.emit(`There's no ${person} here to talk to.`, "error");
      return rejected("MISSING_REFERENT", person);
    }
    const dialogue = ctx.world.passage(npc.id);
    if (dialogue.length === 0) {
      ctx.out.emit(`You try to talk to the ${person}, but they don't respond.`, "error");
      return OK;
    }
    ctx.passage(npc.id);
    return OK;
  });
}

export function createBoardwalkModule(def: WorldDefinition): WorldModule {
  return {
    id: def.id,
    title: def.title,
    description: def.description,
    build() {
      const world = buildWorld(def);
      attachBoardwalkCallbacks(world);
      return world;
    },
    install: installBoardwalkCommands,
  };
}

export async function loadBoardwalk(filePath: string = BOARDWALK_FILE): Promise<WorldModule> {
  return createBoardwalkModule(await loadWorldDefinition(filePath));
}
