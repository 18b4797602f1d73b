import express from "express";
import type { Server } from "node:http";
import { WayfarerError } from "@wayfarer/schemas";
import type { JournalEventType, TurnResult } from "@wayfarer/schemas";
import type { GameSession, SessionManager, WorldCatalog } from "@wayfarer/engine";
import type { Journal } from "@wayfarer/journal";

// ─── Constants ────────────────────────────────────────────────────
const MAX_INPUT_LENGTH = 500;
const MAX_NAME_LENGTH = 64;
const MAX_TRANSCRIPT_PAGE = 500;
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Logs to stderr; stack traces only outside production. */
function logError(label: string, err: unknown): void {
  if (process.env.NODE_ENV === "production") {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[api] ${label}: ${msg}`);
  } else {
    console.error(`[api] ${label}:`, err);
  }
}

// ─── Input Validation ─────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface CreateSessionInput {
  world?: string;
  player_name?: string;
}

/** Returns the parsed body, or an error message. */
export function parseCreateSessionInput(body: unknown): CreateSessionInput | string {
  if (body === undefined) return {};
  if (!isRecord(body)) return "Request body must be a JSON object";
  const input: CreateSessionInput = {};
  if (body.world !== undefined) {
    if (typeof body.world !== "string" || body.world.trim() === "") return "world must be a non-empty string";
    input.world = body.world.trim();
  }
  if (body.player_name !== undefined) {
    if (typeof body.player_name !== "string" || body.player_name.length > MAX_NAME_LENGTH) {
      return `player_name must be a string of at most ${MAX_NAME_LENGTH} characters`;
    }
    input.player_name = body.player_name;
  }
  return input;
}

export function parseCommandInput(body: unknown): string | { error: string } {
  if (!isRecord(body)) return { error: "Request body must be a JSON object" };
  if (typeof body.input !== "string") return { error: "input is required and must be a string" };
  if (body.input.length > MAX_INPUT_LENGTH) return { error: `input must be at most ${MAX_INPUT_LENGTH} characters` };
  return body.input;
}

function parsePaging(value: unknown, fallback: number, max: number): number | null {
  if (value === undefined) return fallback;
  if (typeof value !== "string") return null;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) return null;
  return Math.min(n, max);
}

/** HTTP status for an engine error. Anything unmapped is a 500. */
export function statusForError(err: unknown): number {
  if (!(err instanceof WayfarerError)) return 500;
  switch (err.code) {
    case "UNKNOWN_WORLD":
    case "SESSION_NOT_FOUND":
      return 404;
    case "SESSION_LIMIT":
      return 429;
    default:
      return 500;
  }
}

// ─── Server ───────────────────────────────────────────────────────

export interface GameApiServerConfig {
  sessions: SessionManager;
  catalog: WorldCatalog;
  /** Records transcripts when given. */
  journal?: Journal;
  version?: string;
}

/** JSON API over a SessionManager, mounted under /api. */
export class GameApiServer {
  private app: express.Application;
  private sessions: SessionManager;
  private catalog: WorldCatalog;
  private journal?: Journal;
  private version: string;
  private httpServer?: Server;

  constructor(config: GameApiServerConfig) {
    this.sessions = config.sessions;
    this.catalog = config.catalog;
    this.journal = config.journal;
    this.version = config.version ?? "0.1.0";

    this.app = express();
    this.app.use(express.json({ limit: "64kb" }));
    this.app.use((_req, res, next) => {
      res.setHeader("X-Content-Type-Options", "nosniff");
      res.setHeader("Cache-Control", "no-store");
      next();
    });
    this.setupRoutes();
  }

  getExpressApp(): express.Application {
    return this.app;
  }

  listen(port: number): Server {
    const server = this.app.listen(port, () => {
      const addr = server.address();
      const actualPort = typeof addr === "object" && addr ? addr.port : port;
      console.log(`Wayfarer API listening on http://localhost:${actualPort}`);
    });
    this.httpServer = server;
    return server;
  }

  async shutdown(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async record(session: GameSession, type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    if (this.journal) await this.journal.tryEmit(session.id, type, payload);
  }

  private async recordTurn(session: GameSession, result: TurnResult): Promise<void> {
    await this.record(session, "turn.completed", {
      input: result.input,
      template: result.template,
      outcome: result.outcome,
      events: result.events,
      turn: result.turn,
    });
  }

  private fail(res: express.Response, label: string, err: unknown): void {
    const status = statusForError(err);
    if (status === 500) {
      logError(label, err);
      res.status(500).json({ error: "Internal server error" });
      return;
    }
    const code = err instanceof WayfarerError ? err.code : undefined;
    res.status(status).json({ error: err instanceof Error ? err.message : String(err), code });
  }

  private setupRoutes(): void {
    const router = express.Router();

    router.get("/health", async (_req, res) => {
      let journal: { valid: boolean; broken_at?: number } | undefined;
      if (this.journal) {
        try {
          const integrity = await this.journal.verifyIntegrity();
          journal = { valid: integrity.valid, broken_at: integrity.brokenAt };
        } catch (err) {
          logError("GET /health", err);
          journal = { valid: false };
        }
      }
      res.json({
        status: journal && !journal.valid ? "degraded" : "healthy",
        version: this.version,
        timestamp: new Date().toISOString(),
        sessions: { active: this.sessions.size, capacity: this.sessions.capacity },
        worlds: this.catalog.ids().length,
        journal,
      });
    });

    router.get("/worlds", (_req, res) => {
      res.json({ worlds: this.catalog.list() });
    });

    router.get("/sessions", (_req, res) => {
      res.json({ sessions: this.sessions.list() });
    });

    router.post("/sessions", async (req, res) => {
      const input = parseCreateSessionInput(req.body);
      if (typeof input === "string") { res.status(400).json({ error: input }); return; }
      try {
        const session = this.sessions.create(input.world, input.player_name);
        const opening = session.start();
        await this.record(session, "session.started", { world: session.module.id, player_name: session.state.playerName });
        res.status(201).json({
          session_id: session.id,
          world: session.module.id,
          player_name: session.state.playerName,
          events: opening.events,
        });
      } catch (err) { this.fail(res, "POST /sessions", err); }
    });

    router.get("/sessions/:id", (req, res) => {
      if (!UUID_RE.test(req.params.id)) { res.status(400).json({ error: "Invalid session ID format" }); return; }
      const session = this.sessions.get(req.params.id);
      if (!session) { res.status(404).json({ error: "Session not found" }); return; }
      res.json(session.snapshot());
    });

    router.post("/sessions/:id/commands", async (req, res) => {
      if (!UUID_RE.test(req.params.id)) { res.status(400).json({ error: "Invalid session ID format" }); return; }
      const input = parseCommandInput(req.body);
      if (typeof input !== "string") { res.status(400).json(input); return; }
      try {
        const session = this.sessions.require(req.params.id);
        const result = session.execute(input);
        await this.recordTurn(session, result);
        res.json(result);
      } catch (err) { this.fail(res, "POST /sessions/:id/commands", err); }
    });

    router.post("/sessions/:id/restart", async (req, res) => {
      if (!UUID_RE.test(req.params.id)) { res.status(400).json({ error: "Invalid session ID format" }); return; }
      try {
        const session = this.sessions.require(req.params.id);
        const opening = session.restart();
        await this.record(session, "session.restarted", { world: session.module.id });
        res.json({ session_id: session.id, events: opening.events });
      } catch (err) { this.fail(res, "POST /sessions/:id/restart", err); }
    });

    router.delete("/sessions/:id", async (req, res) => {
      if (!UUID_RE.test(req.params.id)) { res.status(400).json({ error: "Invalid session ID format" }); return; }
      const session = this.sessions.get(req.params.id);
      if (!session || !this.sessions.end(session.id)) { res.status(404).json({ error: "Session not found" }); return; }
      await this.record(session, "session.ended", { reason: "deleted", turn: session.state.turnCount });
      res.json({ session_id: session.id, ended: true });
    });

    router.get("/sessions/:id/transcript", (req, res) => {
      if (!UUID_RE.test(req.params.id)) { res.status(400).json({ error: "Invalid session ID format" }); return; }
      if (!this.journal) { res.status(404).json({ error: "Transcripts are not recorded" }); return; }
      const offset = parsePaging(req.query.offset, 0, Number.MAX_SAFE_INTEGER);
      const limit = parsePaging(req.query.limit, MAX_TRANSCRIPT_PAGE, MAX_TRANSCRIPT_PAGE);
      if (offset === null || limit === null) {
        res.status(400).json({ error: "offset and limit must be non-negative integers" });
        return;
      }
      const total = this.journal.getSessionEventCount(req.params.id);
      if (total === 0) { res.status(404).json({ error: "No transcript for session" }); return; }
      const events = this.journal.readSession(req.params.id, { offset, limit });
      res.json({ session_id: req.params.id, total, offset, events });
    });

    this.app.use("/api", router);

    this.app.use((_req, res) => {
      res.status(404).json({ error: "Not found" });
    });
    // Malformed JSON bodies surface here from express.json().
    this.app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) { next(err); return; }
      if (err instanceof SyntaxError) { res.status(400).json({ error: "Malformed JSON body" }); return; }
      logError("unhandled", err);
      res.status(500).json({ error: "Internal server error" });
    });
  }
}
