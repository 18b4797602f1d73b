import { WayfarerError } from "@wayfarer/schemas";
import type { Logger } from "@wayfarer/schemas";
import { createLogger } from "./logger.js";
import { GameSession } from "./session.js";
import type { WorldCatalog } from "./world-catalog.js";

export interface SessionManagerOptions {
  catalog: WorldCatalog;
  /** Default: 100 */
  maxSessions?: number;
  /** Sessions with no turn for this long are dropped. Default: 30 minutes */
  idleTimeoutMs?: number;
  /** World used when create() is called without one. Default: the first catalogued world. */
  defaultWorld?: string;
  logger?: Logger;
}

export interface SessionSummary {
  session_id: string;
  world: string;
  player_name: string;
  turn: number;
  created_at: string;
  last_active_at: string;
}

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

/** Owns every live session. Each one gets its own freshly built World. */
export class SessionManager {
  private sessions = new Map<string, GameSession>();
  private catalog: WorldCatalog;
  private maxSessions: number;
  private idleTimeoutMs: number;
  private defaultWorld: string | undefined;
  private logger: Logger;

  constructor(options: SessionManagerOptions) {
    this.catalog = options.catalog;
    this.maxSessions = options.maxSessions ?? 100;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.defaultWorld = options.defaultWorld;
    this.logger = options.logger ?? createLogger("sessions");
  }

  create(worldId?: string, playerName?: string): GameSession {
    this.pruneIdle();
    if (this.sessions.size >= this.maxSessions) {
      throw new WayfarerError("SESSION_LIMIT", `Session limit reached (${this.maxSessions})`, { max: this.maxSessions });
    }
    const id = worldId ?? this.defaultWorld ?? this.catalog.ids()[0];
    if (id === undefined) {
      throw new WayfarerError("UNKNOWN_WORLD", "No worlds are registered");
    }
    const session = new GameSession({ module: this.catalog.require(id), playerName, logger: this.logger });
    this.sessions.set(session.id, session);
    this.logger.info("session created", { session_id: session.id, world: id });
    return session;
  }

  get(sessionId: string): GameSession | undefined {
    return this.sessions.get(sessionId);
  }

  require(sessionId: string): GameSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new WayfarerError("SESSION_NOT_FOUND", `Session "${sessionId}" not found`, { session_id: sessionId });
    }
    return session;
  }

  /** Returns false when no such session exists. */
  end(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.logger.info("session ended", { session_id: sessionId });
    return removed;
  }

  /** Drop sessions idle past the timeout. Returns how many were removed. */
  pruneIdle(now = Date.now()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (now - Date.parse(session.lastActiveAt) <= this.idleTimeoutMs) continue;
      this.sessions.delete(id);
      removed++;
      this.logger.info("session expired", { session_id: id, last_active_at: session.lastActiveAt });
    }
    return removed;
  }

  list(): SessionSummary[] {
    this.pruneIdle();
    return [...this.sessions.values()].map((s) => ({
      session_id: s.id,
      world: s.module.id,
      player_name: s.state.playerName,
      turn: s.state.turnCount,
      created_at: s.createdAt,
      last_active_at: s.lastActiveAt,
    }));
  }

  get size(): number {
    return this.sessions.size;
  }

  get capacity(): number {
    return this.maxSessions;
  }
}
