/**
 * Wayfarer Core Types
 *
 * Canonical data shapes shared by the engine, the content packages and
 * every presentation adapter. Nothing here holds behaviour.
 */

// ─── Output ─────────────────────────────────────────────────────────

export const STYLE_TAGS = [
  "room_name",
  "room_desc",
  "item_name",
  "item_desc",
  "command",
  "error",
  "success",
  "hint",
  "speech",
  "system",
  "header",
] as const;

export type StyleTag = (typeof STYLE_TAGS)[number];

export interface OutputEvent {
  text: string;
  style: StyleTag;
}

export function isStyleTag(value: string): value is StyleTag {
  return (STYLE_TAGS as readonly string[]).includes(value);
}

// ─── Errors ─────────────────────────────────────────────────────────

export const ErrorCodes = {
  UNRECOGNIZED_COMMAND: "UNRECOGNIZED_COMMAND",
  MISSING_REFERENT: "MISSING_REFERENT",
  NOT_TAKEABLE: "NOT_TAKEABLE",
  NOT_USABLE: "NOT_USABLE",
  NO_EXIT: "NO_EXIT",
  HANDLER_FAILED: "HANDLER_FAILED",
  INVALID_TEMPLATE: "INVALID_TEMPLATE",
  WORLD_BUILD_FAILED: "WORLD_BUILD_FAILED",
  UNKNOWN_WORLD: "UNKNOWN_WORLD",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  SESSION_LIMIT: "SESSION_LIMIT",
  JOURNAL_INVALID: "JOURNAL_INVALID",
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export class WayfarerError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = "WayfarerError";
    this.code = code;
    this.data = data;
  }
}

/** A command template that cannot be compiled. */
export class TemplateError extends WayfarerError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("INVALID_TEMPLATE", message, data);
    this.name = "TemplateError";
  }
}

/** A world definition or World graph that cannot be built. Fatal at startup. */
export class WorldBuildError extends WayfarerError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("WORLD_BUILD_FAILED", message, data);
    this.name = "WorldBuildError";
  }
}

// ─── Turns ──────────────────────────────────────────────────────────

/** Recoverable, player-facing failures. None of them ends the session. */
export type TurnErrorCode =
  | "UNRECOGNIZED_COMMAND"
  | "MISSING_REFERENT"
  | "NOT_TAKEABLE"
  | "NOT_USABLE"
  | "NO_EXIT"
  | "HANDLER_FAILED";

export type TurnOutcome =
  | { status: "ok" }
  | { status: "rejected"; code: TurnErrorCode; subject?: string };

export interface TurnResult {
  input: string;
  /** Source text of the template that matched, or null for an unrecognized command. */
  template: string | null;
  outcome: TurnOutcome;
  events: OutputEvent[];
  /** Turn counter after the turn ran. */
  turn: number;
}

export interface SessionSnapshot {
  session_id: string;
  world: string;
  player_name: string;
  turn: number;
  room: { id: string; name: string; exits: string[]; items: string[] };
  inventory: string[];
  flags: Record<string, boolean>;
}

// ─── World definitions ──────────────────────────────────────────────

export interface RoomDefinition {
  id: string;
  name: string;
  short_description: string;
  long_description?: string;
  /** direction label → destination room id */
  exits: Record<string, string>;
}

export interface ItemDefinition {
  id: string;
  name: string;
  description: string;
  takeable: boolean;
  hidden: boolean;
  /** Room id, or "inventory" to start in the player's hands. */
  location: string;
}

export interface PassageLine {
  text: string;
  style: StyleTag;
}

export interface WorldDefinition {
  id: string;
  title: string;
  description?: string;
  start: string;
  rooms: RoomDefinition[];
  items: ItemDefinition[];
  passages?: Record<string, PassageLine[]>;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "session.started"
  | "session.restarted"
  | "session.ended"
  | "turn.completed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
