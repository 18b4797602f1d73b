import type { Room } from "./room.js";

export const DEFAULT_PLAYER_NAME = "Adventurer";

export interface GameStateSnapshot {
  turnCount: number;
  playerName: string;
  currentRoom: string | null;
  flags: Record<string, boolean>;
  variables: Record<string, unknown>;
}

/** Per-session mutable state. Reset between sessions, never shared. */
export class GameState {
  turnCount = 0;
  playerName = DEFAULT_PLAYER_NAME;
  currentRoom: Room | null = null;
  private flags = new Map<string, boolean>();
  private variables = new Map<string, unknown>();

  setFlag(name: string, value = true): void {
    this.flags.set(name, value);
  }

  getFlag(name: string, fallback = false): boolean {
    return this.flags.get(name) ?? fallback;
  }

  setVar(name: string, value: unknown): void {
    this.variables.set(name, value);
  }

  getVar(name: string): unknown;
  getVar<T>(name: string, fallback: T): T;
  getVar(name: string, fallback?: unknown): unknown {
    return this.variables.has(name) ? this.variables.get(name) : fallback;
  }

  incrementTurn(): number {
    return ++this.turnCount;
  }

  reset(): void {
    this.turnCount = 0;
    this.playerName = DEFAULT_PLAYER_NAME;
    this.currentRoom = null;
    this.flags.clear();
    this.variables.clear();
  }

  snapshot(): GameStateSnapshot {
    return {
      turnCount: this.turnCount,
      playerName: this.playerName,
      currentRoom: this.currentRoom?.id ?? null,
      flags: Object.fromEntries(this.flags),
      variables: Object.fromEntries(this.variables),
    };
  }
}
