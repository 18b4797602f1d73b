import { Command } from "commander";
import { GameSession, SessionManager, createLogger } from "@wayfarer/engine";
import type { WorldCatalog } from "@wayfarer/engine";
import { Journal } from "@wayfarer/journal";
import { GameApiServer } from "@wayfarer/api";
import { DEFAULT_WORLD, loadDefaultCatalog } from "@wayfarer/worlds";
import { loadConfig, parsePort } from "./config.js";
import type { CliConfig } from "./config.js";
import { GameClient, RealTerminalIO } from "./game-client.js";
import type { TerminalIO } from "./game-client.js";
import { dim, getTheme, isThemeName } from "./theme.js";

export interface ProcessControl {
  exit(code: number): void;
}

export interface ProgramDeps {
  config?: CliConfig;
  loadCatalog?: () => Promise<WorldCatalog>;
  createTerminal?: () => TerminalIO;
  writeLine?: (text: string) => void;
  writeError?: (text: string) => void;
  process?: ProcessControl;
}

interface PlayOptions {
  world?: string;
  name?: string;
  theme?: string;
  transcript?: string;
}

interface ServeOptions {
  port?: string;
  transcript?: string;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const config = deps.config ?? loadConfig();
  const loadCatalog = deps.loadCatalog ?? loadDefaultCatalog;
  const createTerminal = deps.createTerminal ?? (() => new RealTerminalIO());
  const writeLine = deps.writeLine ?? ((text: string) => console.log(text));
  const writeError = deps.writeError ?? ((text: string) => console.error(text));
  const proc = deps.process ?? process;

  const program = new Command();
  program.name("wayfarer").description("Text adventures in the terminal and over HTTP").version("0.1.0");

  // ─── Play Command ─────────────────────────────────────────────────

  program.command("play").description("Play a world in the terminal")
    .option("--world <id>", "World to play (defaults to WAYFARER_WORLD, then the museum)")
    .option("--name <name>", "Player name (skips the name prompt)")
    .option("--theme <theme>", "Color theme: default or spooky")
    .option("--transcript <file>", "Append a JSONL transcript of the game to this file")
    .action(async (opts: PlayOptions) => {
      const themeName = opts.theme ?? config.theme;
      if (!isThemeName(themeName)) {
        writeError(`Unknown theme "${themeName}" (expected default or spooky)`);
        proc.exit(1);
        return;
      }
      const catalog = await loadCatalog();
      const worldId = opts.world ?? config.world ?? DEFAULT_WORLD;
      const mod = catalog.get(worldId);
      if (!mod) {
        writeError(`Unknown world "${worldId}". Available: ${catalog.ids().join(", ")}`);
        proc.exit(1);
        return;
      }

      const logger = createLogger("wayfarer");
      const transcriptPath = opts.transcript;
      const journal = transcriptPath ? new Journal({ filePath: transcriptPath, logger }) : undefined;
      await journal?.init();

      const playerName = opts.name ?? config.playerName;
      const session = new GameSession({ module: mod, playerName, logger });
      const client = new GameClient({
        session,
        terminal: createTerminal(),
        theme: getTheme(themeName),
        journal,
        askName: playerName === undefined,
      });
      await client.run();
      await journal?.close();
    });

  // ─── Worlds Command ───────────────────────────────────────────────

  program.command("worlds").description("List the worlds you can play")
    .action(async () => {
      const catalog = await loadCatalog();
      for (const world of catalog.list()) {
        writeLine(`${world.id.padEnd(12)} ${world.title}`);
        if (world.description) writeLine(`${" ".repeat(13)}${dim(world.description)}`);
      }
    });

  // ─── Serve Command ────────────────────────────────────────────────

  program.command("serve").description("Start the HTTP API")
    .option("--port <n>", "Port to listen on (defaults to WAYFARER_PORT, then 3100)")
    .option("--transcript <file>", "Journal file (defaults to WAYFARER_TRANSCRIPT_PATH)")
    .action(async (opts: ServeOptions) => {
      const port = opts.port !== undefined ? parsePort(opts.port) : config.port;
      const logger = createLogger("api");
      const catalog = await loadCatalog();
      const worldId = config.world ?? DEFAULT_WORLD;
      if (!catalog.has(worldId)) {
        writeError(`Unknown default world "${worldId}". Available: ${catalog.ids().join(", ")}`);
        proc.exit(1);
        return;
      }

      const journal = new Journal({ filePath: opts.transcript ?? config.transcriptPath, logger });
      await journal.init();
      const integrity = await journal.verifyIntegrity();
      if (!integrity.valid) {
        logger.warn("journal hash chain broken", { file: journal.getFilePath(), brokenAt: integrity.brokenAt });
      }
      const sessions = new SessionManager({
        catalog,
        maxSessions: config.maxSessions,
        idleTimeoutMs: config.sessionIdleMs,
        defaultWorld: worldId,
        logger,
      });
      const apiServer = new GameApiServer({ sessions, catalog, journal });
      apiServer.listen(port);

      // Graceful shutdown
      const shutdown = async () => {
        writeLine("\nShutting down...");
        await apiServer.shutdown();
        await journal.close();
        proc.exit(0);
      };
      process.on("SIGTERM", () => { void shutdown(); });
      process.on("SIGINT", () => { void shutdown(); });
    });

  return program;
}
