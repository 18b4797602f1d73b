export { loadDefaultCatalog, DEFAULT_WORLD } from "./catalog.js";
export { createMuseumModule, loadMuseum, attachMuseumCallbacks, installMuseumCommands, MUSEUM_FILE } from "./museum.js";
export {
  createBoardwalkModule,
  loadBoardwalk,
  attachBoardwalkCallbacks,
  installBoardwalkCommands,
  BOARDWALK_FILE,
} from "./boardwalk.js";
export { dataFile } from "./data-files.js";
