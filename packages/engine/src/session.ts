import { v4 as uuid } from "uuid";
import type { Logger, SessionSnapshot, TurnOutcome, TurnResult } from "@wayfarer/schemas";
import type { Bag } from "./bag.js";
import { CommandGrammar } from "./command-grammar.js";
import { GameContext } from "./context.js";
import { DEFAULT_PLAYER_NAME, GameState } from "./game-state.js";
import { enterRoom, registerBuiltins, rejected } from "./handlers/index.js";
import type { GameGrammar } from "./handlers/index.js";
import type { Item } from "./item.js";
import { createLogger } from "./logger.js";
import { OutputBuffer } from "./output.js";
import type { World } from "./world.js";
import type { WorldModule } from "./world-catalog.js";

export interface GameSessionOptions {
  module: WorldModule;
  playerName?: string;
  id?: string;
  logger?: Logger;
}

/**
 * One player's game: a private World built from the module's factory, its
 * GameState and a grammar holding the built-ins plus the module's verbs.
 * Turns are synchronous and run to completion.
 */
export class GameSession {
  readonly id: string;
  readonly module: WorldModule;
  readonly state = new GameState();
  readonly grammar: GameGrammar = new CommandGrammar<GameContext, TurnOutcome>();
  readonly createdAt: string;
  lastActiveAt: string;
  private currentWorld: World;
  private out = new OutputBuffer();
  private ctx: GameContext;
  private logger: Logger;
  private started = false;

  constructor(options: GameSessionOptions) {
    this.id = options.id ?? uuid();
    this.module = options.module;
    this.logger = options.logger ?? createLogger("session");
    this.state.playerName = cleanPlayerName(options.playerName);
    registerBuiltins(this.grammar);
    this.module.install?.(this.grammar);
    this.currentWorld = this.module.build();
    this.ctx = this.contextFor(this.currentWorld);
    this.createdAt = new Date().toISOString();
    this.lastActiveAt = this.createdAt;
  }

  get world(): World {
    return this.currentWorld;
  }

  get inventory(): Bag<Item> {
    return this.currentWorld.inventory;
  }

  get context(): GameContext {
    return this.ctx;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Place the player in the start room and render it, after the world's intro
   * passage. On a session that is already running it re-renders the current room.
   */
  start(): TurnResult {
    if (this.started) this.ctx.room.describe(this.out);
    else this.begin();
    return this.result("", null, { status: "ok" });
  }

  execute(line: string): TurnResult {
    const input = line.trim();
    this.lastActiveAt = new Date().toISOString();
    if (!this.started) this.begin();

    if (input === "") {
      this.out.emit("What would you like to do?", "hint");
      return this.result(input, null, rejected("UNRECOGNIZED_COMMAND"));
    }

    const found = this.grammar.match(input);
    if (!found) {
      this.out.emit(`I don't understand "${input}".`, "error");
      return this.result(input, null, rejected("UNRECOGNIZED_COMMAND", input));
    }

    let outcome: TurnOutcome;
    try {
      outcome = found.template.handler(this.ctx, found.args);
    } catch (err) {
      this.logger.error("handler failed", {
        session_id: this.id,
        input,
        template: found.template.source,
        error: err instanceof Error ? err.message : String(err),
      });
      this.out.emit("Something went wrong.", "error");
      outcome = rejected("HANDLER_FAILED");
    }
    return this.result(input, found.template.source, outcome);
  }

  /** Rebuild the world from the module and reset state, keeping the player's name. */
  restart(): TurnResult {
    this.lastActiveAt = new Date().toISOString();
    const playerName = this.state.playerName;
    this.currentWorld = this.module.build();
    this.ctx = this.contextFor(this.currentWorld);
    this.state.reset();
    this.state.playerName = playerName;
    this.out.drain();
    this.started = false;
    this.logger.debug("session restarted", { session_id: this.id, world: this.module.id });
    return this.start();
  }

  snapshot(): SessionSnapshot {
    const room = this.state.currentRoom ?? this.currentWorld.start;
    return {
      session_id: this.id,
      world: this.module.id,
      player_name: this.state.playerName,
      turn: this.state.turnCount,
      room: {
        id: room.id,
        name: room.name,
        exits: room.exitDirections,
        items: room.visibleItems().map((item) => item.name),
      },
      inventory: this.inventory.toArray().filter((item) => !item.hidden).map((item) => item.name),
      flags: this.state.snapshot().flags,
    };
  }

  private begin(): void {
    this.started = true;
    if (this.module.intro) this.ctx.passage(this.module.intro);
    enterRoom(this.ctx, this.currentWorld.start);
  }

  private result(input: string, template: string | null, outcome: TurnOutcome): TurnResult {
    return { input, template, outcome, events: this.out.drain(), turn: this.state.turnCount };
  }

  private contextFor(world: World): GameContext {
    return new GameContext({
      state: this.state,
      inventory: world.inventory,
      world,
      out: this.out,
      logger: this.logger,
    });
  }
}

export function cleanPlayerName(name: string | undefined): string {
  const trimmed = name?.trim() ?? "";
  return trimmed === "" ? DEFAULT_PLAYER_NAME : trimmed.slice(0, 64);
}
