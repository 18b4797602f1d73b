import { WorldCatalog } from "@wayfarer/engine";
import { loadBoardwalk } from "./boardwalk.js";
import { loadMuseum } from "./museum.js";

export const DEFAULT_WORLD = "museum";

/** Every world shipped with the game, museum first. */
export async function loadDefaultCatalog(): Promise<WorldCatalog> {
  const [museum, boardwalk] = await Promise.all([loadMuseum(), loadBoardwalk()]);
  return new WorldCatalog([museum, boardwalk]);
}
