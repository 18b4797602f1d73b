import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { DEFAULT_IDLE_TIMEOUT_MS } from "@wayfarer/engine";
import { DEFAULT_MAX_SESSIONS, DEFAULT_PORT, loadConfig, parsePort, parsePositiveInt } from "./config.js";

describe("parsePort", () => {
  it("accepts valid ports", () => {
    expect(parsePort("8080")).toBe(8080);
  });

  it("rejects out-of-range and non-numeric values", () => {
    expect(() => parsePort("0")).toThrow('Invalid port: "0"');
    expect(() => parsePort("70000")).toThrow("Invalid port");
    expect(() => parsePort("abc", "WAYFARER_PORT")).toThrow('Invalid WAYFARER_PORT: "abc"');
  });
});

describe("parsePositiveInt", () => {
  it("parses positive integers", () => {
    expect(parsePositiveInt("5", "n")).toBe(5);
  });

  it("uses the fallback when given", () => {
    expect(parsePositiveInt("-1", "n", 7)).toBe(7);
  });

  it("throws without a fallback", () => {
    expect(() => parsePositiveInt("1.5", "n")).toThrow('Invalid n: "1.5" (must be a positive integer)');
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      world: undefined,
      theme: "default",
      playerName: undefined,
      port: DEFAULT_PORT,
      maxSessions: DEFAULT_MAX_SESSIONS,
      sessionIdleMs: DEFAULT_IDLE_TIMEOUT_MS,
      transcriptPath: resolve("journal/transcripts.jsonl"),
    });
  });

  it("reads WAYFARER_* variables", () => {
    const config = loadConfig({
      WAYFARER_WORLD: "boardwalk",
      WAYFARER_THEME: "spooky",
      WAYFARER_PLAYER_NAME: "Mara",
      WAYFARER_PORT: "4000",
      WAYFARER_MAX_SESSIONS: "3",
      WAYFARER_SESSION_IDLE_MS: "60000",
      WAYFARER_TRANSCRIPT_PATH: "/tmp/wayfarer-test.jsonl",
    });
    expect(config).toEqual({
      world: "boardwalk",
      theme: "spooky",
      playerName: "Mara",
      port: 4000,
      maxSessions: 3,
      sessionIdleMs: 60000,
      transcriptPath: "/tmp/wayfarer-test.jsonl",
    });
  });

  it("falls back when the session limit is not a positive integer", () => {
    expect(loadConfig({ WAYFARER_MAX_SESSIONS: "none" }).maxSessions).toBe(DEFAULT_MAX_SESSIONS);
  });

  it("falls back when the idle timeout is not a positive integer", () => {
    expect(loadConfig({ WAYFARER_SESSION_IDLE_MS: "0" }).sessionIdleMs).toBe(DEFAULT_IDLE_TIMEOUT_MS);
  });

  it("rejects a bad port", () => {
    expect(() => loadConfig({ WAYFARER_PORT: "99999" })).toThrow("Invalid WAYFARER_PORT");
  });
});
