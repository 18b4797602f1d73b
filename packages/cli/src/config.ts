import { resolve } from "node:path";
import { DEFAULT_IDLE_TIMEOUT_MS } from "@wayfarer/engine";

export function parsePort(value: string, label = "port"): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function parsePositiveInt(value: string, label: string, fallback?: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    if (fallback !== undefined) return fallback;
    throw new Error(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

export interface CliConfig {
  world: string | undefined;
  theme: string;
  playerName: string | undefined;
  port: number;
  maxSessions: number;
  /** Idle time after which the HTTP server drops a session. */
  sessionIdleMs: number;
  /** Journal file for the HTTP server. `play` only writes one when asked. */
  transcriptPath: string;
}

export const DEFAULT_PORT = 3100;
export const DEFAULT_MAX_SESSIONS = 100;

/** Read WAYFARER_* settings once. Command-line options override these. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    world: env.WAYFARER_WORLD || undefined,
    theme: env.WAYFARER_THEME || "default",
    playerName: env.WAYFARER_PLAYER_NAME || undefined,
    port: env.WAYFARER_PORT ? parsePort(env.WAYFARER_PORT, "WAYFARER_PORT") : DEFAULT_PORT,
    maxSessions: parsePositiveInt(
      env.WAYFARER_MAX_SESSIONS ?? String(DEFAULT_MAX_SESSIONS),
      "WAYFARER_MAX_SESSIONS",
      DEFAULT_MAX_SESSIONS,
    ),
    sessionIdleMs: parsePositiveInt(
      env.WAYFARER_SESSION_IDLE_MS ?? String(DEFAULT_IDLE_TIMEOUT_MS),
      "WAYFARER_SESSION_IDLE_MS",
      DEFAULT_IDLE_TIMEOUT_MS,
    ),
    transcriptPath: env.WAYFARER_TRANSCRIPT_PATH ?? resolve("journal/transcripts.jsonl"),
  };
}
