export { tokenize } from "./tokenizer.js";
export { CommandGrammar, compileTemplate, bindTokens } from "./command-grammar.js";
export type {
  TemplateToken,
  CommandArgs,
  CommandHandler,
  CompiledTemplate,
  CommandMatch,
  DispatchResult,
} from "./command-grammar.js";
export { Bag } from "./bag.js";
export type { Named } from "./bag.js";
export { Item } from "./item.js";
export type { ItemOptions } from "./item.js";
export { InteractionTable, useItem } from "./interaction.js";
export type { UseCallback, UseKey, UseResolution, UseOutcome } from "./interaction.js";
export { Room } from "./room.js";
export type { RoomOptions } from "./room.js";
export { move, normalizeDirection, isCompassDirection, COMPASS_DIRECTIONS, DIRECTION_ALIASES } from "./movement.js";
export type { MoveResult } from "./movement.js";
export { World } from "./world.js";
export { GameState, DEFAULT_PLAYER_NAME } from "./game-state.js";
export type { GameStateSnapshot } from "./game-state.js";
export { OutputBuffer } from "./output.js";
export type { OutputSink } from "./output.js";
export { GameContext } from "./context.js";
export type { GameContextInit } from "./context.js";
export { registerBuiltins, enterRoom, HELP_ENTRIES, OK, rejected, arg } from "./handlers/index.js";
export type { GameHandler, GameGrammar } from "./handlers/index.js";
export { GameSession, cleanPlayerName } from "./session.js";
export type { GameSessionOptions } from "./session.js";
export { SessionManager, DEFAULT_IDLE_TIMEOUT_MS } from "./session-manager.js";
export type { SessionManagerOptions, SessionSummary } from "./session-manager.js";
export { WorldCatalog } from "./world-catalog.js";
export type { WorldModule, WorldSummary } from "./world-catalog.js";
export { parseWorldDefinition, loadWorldDefinition, buildWorld, INVENTORY_LOCATION } from "./world-loader.js";
export { ConsoleLogger, createLogger } from "./logger.js";
