import * as readline from "node:readline";
import type { JournalEventType, OutputEvent } from "@wayfarer/schemas";
import { cleanPlayerName, HELP_ENTRIES } from "@wayfarer/engine";
import type { GameSession } from "@wayfarer/engine";
import type { Journal } from "@wayfarer/journal";
import { DEFAULT_THEME, formatEvents, gamePrompt, titleBanner } from "./theme.js";
import type { Theme } from "./theme.js";

// ─── DI Interfaces ────────────────────────────────────────────────

/** Terminal I/O abstraction (wraps readline + stdout). */
export interface TerminalIO {
  createReadline(): void;
  closeReadline(): void;
  setPrompt(prompt: string): void;
  prompt(): void;
  onLine(handler: (line: string) => void): void;
  onClose(handler: () => void): void;
  question(prompt: string, callback: (answer: string) => void): void;
  writeLine(text: string): void;
}

// ─── GameClient ───────────────────────────────────────────────────

export interface GameClientConfig {
  session: GameSession;
  terminal: TerminalIO;
  theme?: Theme;
  /** Records the transcript when given. */
  journal?: Journal;
  /** Prompt for the player's name before the first room. Default: true */
  askName?: boolean;
}

export type EndReason = "quit" | "closed";

const QUIT_WORDS = new Set(["quit", "exit"]);
const RESTART_WORD = "restart";

export class GameClient {
  private _ended = false;
  private _onEnd: (reason: EndReason) => void = () => undefined;
  private _pending: Promise<void> = Promise.resolve();

  private readonly _session: GameSession;
  private readonly _terminal: TerminalIO;
  private readonly _theme: Theme;
  private readonly _journal: Journal | null;
  private readonly _askName: boolean;

  constructor(config: GameClientConfig) {
    this._session = config.session;
    this._terminal = config.terminal;
    this._theme = config.theme ?? DEFAULT_THEME;
    this._journal = config.journal ?? null;
    this._askName = config.askName ?? true;
  }

  get hasEnded(): boolean {
    return this._ended;
  }

  /** Show the title screen and run the REPL. Resolves once the game ends and the transcript is flushed. */
  run(): Promise<EndReason> {
    return new Promise<EndReason>((resolve) => {
      this._onEnd = resolve;
      this._terminal.createReadline();
      // Registered before the name prompt so EOF there still ends the game
      this._terminal.onClose(() => this.end("closed"));
      this.showTitle();
      if (this._askName) {
        this._terminal.question("What is your name, traveler? ", (answer) => this.begin(answer));
      } else {
        this.begin(undefined);
      }
    });
  }

  handleLine(line: string): void {
    if (this._ended) return;
    const word = line.trim().toLowerCase();

    if (QUIT_WORDS.has(word)) {
      this.write([{ text: `Thanks for playing, ${this._session.state.playerName}!`, style: "system" }]);
      this.end("quit");
      return;
    }

    if (word === RESTART_WORD) {
      const result = this._session.restart();
      this.write(result.events);
      this.record("session.restarted", { world: this._session.module.id });
      this._terminal.prompt();
      return;
    }

    const result = this._session.execute(line);
    this.write(result.events);
    this.record("turn.completed", {
      input: result.input,
      template: result.template,
      outcome: result.outcome,
      events: result.events,
      turn: result.turn,
    });
    this._terminal.prompt();
  }

  private showTitle(): void {
    const mod = this._session.module;
    this.write(titleBanner(mod.title).map((text): OutputEvent => ({ text, style: "header" })));
    if (mod.description) this.write([{ text: mod.description, style: "room_desc" }]);
    this._terminal.writeLine("");
  }

  private begin(answer: string | undefined): void {
    if (this._ended) return;
    if (answer !== undefined) this._session.state.playerName = cleanPlayerName(answer);
    const name = this._session.state.playerName;
    this.write([
      { text: `Welcome, ${name}!`, style: "system" },
      { text: "Type 'help' for a list of commands, 'quit' to leave.", style: "hint" },
    ]);
    this._terminal.writeLine("");

    const opening = this._session.start();
    this.write(opening.events);
    this.record("session.started", { world: this._session.module.id, player_name: name });

    this._terminal.setPrompt(gamePrompt(this._theme));
    this._terminal.onLine((line) => this.handleLine(line));
    this._terminal.prompt();
  }

  private end(reason: EndReason): void {
    if (this._ended) return;
    this._ended = true;
    if (this._session.isStarted) {
      this.record("session.ended", { reason, turn: this._session.state.turnCount });
    }
    this._terminal.closeReadline();
    void this._pending.then(() => this._onEnd(reason));
  }

  private write(events: readonly OutputEvent[]): void {
    for (const line of formatEvents(events, this._theme)) this._terminal.writeLine(line);
  }

  // Writes are chained so transcript order matches turn order.
  private record(type: JournalEventType, payload: Record<string, unknown>): void {
    const journal = this._journal;
    if (!journal) return;
    const sessionId = this._session.id;
    this._pending = this._pending.then(async () => {
      await journal.tryEmit(sessionId, type, payload);
    });
  }
}

// ─── Completion ───────────────────────────────────────────────────

const COMPLETIONS = [
  ...new Set(HELP_ENTRIES.map(([command]) => command.split(" ")[0] ?? "")),
  "restart",
].filter((word) => word !== "");

/** readline-compatible completer for the leading verb. */
export function completer(line: string): [string[], string] {
  if (line.includes(" ")) return [[], line];
  const lower = line.toLowerCase();
  const hits = COMPLETIONS.filter((c) => c.startsWith(lower));
  return [hits, line];
}

// ─── RealTerminalIO ───────────────────────────────────────────────

export class RealTerminalIO implements TerminalIO {
  private _rl: readline.Interface | null = null;

  createReadline(): void {
    // Close existing readline to prevent listener stacking on process.stdin
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
    }
    this._rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      completer,
    });
  }

  closeReadline(): void {
    if (this._rl) {
      this._rl.removeAllListeners();
      this._rl.close();
      this._rl = null;
    }
  }

  setPrompt(prompt: string): void {
    if (this._rl) this._rl.setPrompt(prompt);
  }

  prompt(): void {
    if (this._rl) this._rl.prompt(true);
  }

  onLine(handler: (line: string) => void): void {
    if (this._rl) this._rl.on("line", handler);
  }

  onClose(handler: () => void): void {
    if (this._rl) this._rl.on("close", handler);
  }

  question(prompt: string, callback: (answer: string) => void): void {
    if (this._rl) this._rl.question(prompt, callback);
  }

  writeLine(text: string): void {
    console.log(text);
  }
}
