import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { JournalEvent, JournalEventType, Logger } from "@wayfarer/schemas";
import { WayfarerError, validateJournalEventData } from "@wayfarer/schemas";

export interface JournalOptions {
  /** JSONL file to append to. Omit for an in-memory transcript. */
  filePath?: string;
  /** Maximum number of sessions to keep in the in-memory index (LRU eviction). Default: 1000 */
  maxSessionsIndexed?: number;
  /** How to handle a broken hash chain on init. "truncate" (default) keeps the valid prefix; "strict" throws. */
  recovery?: "truncate" | "strict";
  logger?: Logger;
}

/**
 * Append-only, hash-chained record of what happened in each game session:
 * session lifecycle plus one event per turn with the input and the output it produced.
 */
export class Journal {
  private filePath: string | null;
  private lastHash: string | undefined;
  private writeLock: Promise<void> = Promise.resolve();
  private sessionIndex = new Map<string, JournalEvent[]>();
  private sessionAccessOrder: string[] = [];
  private maxSessionsIndexed: number;
  private nextSeq = 0;
  private recovery: "truncate" | "strict";
  private logger?: Logger;

  constructor(options?: JournalOptions) {
    this.filePath = options?.filePath ?? null;
    this.maxSessionsIndexed = options?.maxSessionsIndexed ?? 1000;
    this.recovery = options?.recovery ?? "truncate";
    this.logger = options?.logger;
  }

  async init(): Promise<void> {
    if (!this.filePath) return;
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const lines = await this.readLines();
    let prevHash: string | undefined;
    let maxSeq = -1;
    const tempIndex = new Map<string, JournalEvent[]>();

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      let event: JournalEvent;
      try {
        event = JSON.parse(line) as JournalEvent;
      } catch {
        if (this.recovery === "strict") {
          throw new WayfarerError("JOURNAL_INVALID", `Journal line ${i} is not valid JSON`);
        }
        await this.truncateTo(lines.slice(0, i), lines.length - i);
        break;
      }
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new WayfarerError("JOURNAL_INVALID", `Journal integrity violation at event ${i}: hash chain broken`, { seq: event.seq });
        }
        await this.truncateTo(lines.slice(0, i), lines.length - i);
        break;
      }
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.session_id);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.session_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    for (const [sid, events] of tempIndex) {
      this.trackSessionAccess(sid);
      this.sessionIndex.set(sid, events);
    }
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  async emit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent> {
    let releaseLock: () => void = () => undefined;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        session_id: sessionId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new WayfarerError("JOURNAL_INVALID", `Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);
      if (this.filePath) {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // Only advance the chain once the write succeeded
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;

      const bucket = this.sessionIndex.get(sessionId);
      if (bucket) bucket.push(event);
      else this.sessionIndex.set(sessionId, [event]);
      this.trackSessionAccess(sessionId);
      this.evictSessionsIfNeeded();

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit(), but reports a failed write through the logger instead of throwing. */
  async tryEmit(
    sessionId: string,
    type: JournalEventType,
    payload: Record<string, unknown>
  ): Promise<JournalEvent | null> {
    try {
      return await this.emit(sessionId, type, payload);
    } catch (err) {
      this.logger?.error("journal write failed", { session_id: sessionId, type, error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  readSession(sessionId: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.sessionIndex.get(sessionId) ?? [];
    if (events.length > 0) {
      this.trackSessionAccess(sessionId);
    }
    if (!options) return [...events];
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  getSessionEventCount(sessionId: string): number {
    return (this.sessionIndex.get(sessionId) ?? []).length;
  }

  /** Every event on file, or every indexed event for an in-memory journal. */
  async readAll(): Promise<JournalEvent[]> {
    if (!this.filePath) {
      return [...this.sessionIndex.values()].flat().sort((a, b) => (a.seq ?? 0) - (b.seq ?? 0));
    }
    if (!existsSync(this.filePath)) return [];
    return (await this.readLines()).map((line) => JSON.parse(line) as JournalEvent);
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i];
      if (!event) break;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit so no turn is lost. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  private async readLines(): Promise<string[]> {
    if (!this.filePath) return [];
    const content = await readFile(this.filePath, "utf-8");
    return content.trim().split("\n").filter(Boolean);
  }

  private async truncateTo(validLines: string[], dropped: number): Promise<void> {
    if (!this.filePath) return;
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
    await rename(tmpPath, this.filePath);
    this.logger?.warn(`recovered from corruption, truncated ${dropped} events`, { file: this.filePath });
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private trackSessionAccess(sessionId: string): void {
    const idx = this.sessionAccessOrder.indexOf(sessionId);
    if (idx !== -1) {
      this.sessionAccessOrder.splice(idx, 1);
    }
    this.sessionAccessOrder.push(sessionId);
  }

  private evictSessionsIfNeeded(): void {
    while (this.sessionIndex.size > this.maxSessionsIndexed) {
      const oldest = this.sessionAccessOrder.shift();
      if (oldest === undefined) break;
      this.sessionIndex.delete(oldest);
    }
  }
}
