// PitchScoop - Entry point
// Loads configuration, wires stores and services, and starts the server.

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { FileAudioStorage } from "./audio-storage.js";
import { createAzureCompletionClient } from "./completion-client.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { EventManager } from "./event-manager.js";
import { InMemoryEventStore } from "./event-store.js";
import { LeaderboardService } from "./leaderboard.js";
import { createConsoleLogger } from "./logger.js";
import { ToolRegistry } from "./mcp-tools.js";
import { PitchScorer } from "./pitch-scorer.js";
import { InMemoryScoreStore } from "./score-store.js";
import { createAppServer, type AppServer } from "./server.js";
import { SessionLocks } from "./session-locks.js";
import { SessionManager } from "./session-manager.js";
import { InMemorySessionStore } from "./session-store.js";

export const APP_NAME = "PitchScoop";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

/** Builds the full object graph for a validated configuration. */
export function buildApp(config: AppConfig): AppServer {
  const log = (scope: string) => createConsoleLogger(scope, config.logLevel);
  const init = log("Init");

  // ─── Stores ─────────────────────────────────────────────────────────────────

  init.info("Creating in-memory event, session and score stores");
  const eventStore = new InMemoryEventStore();
  const sessionStore = new InMemorySessionStore();
  const scoreStore = new InMemoryScoreStore();

  init.info("Initializing audio storage", { dir: config.audioStorageDir });
  const audioStorage = new FileAudioStorage({
    baseDir: config.audioStorageDir,
    publicBaseUrl: config.publicBaseUrl,
    secret: config.playbackUrlSecret,
  });

  // ─── Services ───────────────────────────────────────────────────────────────

  init.info("Creating Azure OpenAI completion client", {
    deployment: config.azure.deployment,
    timeout_ms: config.azure.timeoutMs,
    max_retries: config.azure.maxRetries,
  });
  const completionClient = createAzureCompletionClient(config.azure, log("CompletionClient"));
  const locks = new SessionLocks();

  const eventManager = new EventManager({
    eventStore,
    sessionStore,
    scoreStore,
    audioStorage,
    locks,
    logger: log("EventManager"),
  });
  const sessionManager = new SessionManager({
    sessionStore,
    scoreStore,
    eventManager,
    audioStorage,
    publicBaseUrl: config.publicBaseUrl,
    locks,
    logger: log("SessionManager"),
  });
  const pitchScorer = new PitchScorer({
    sessionStore,
    scoreStore,
    eventManager,
    completionClient,
    locks,
    logger: log("PitchScorer"),
  });
  const leaderboard = new LeaderboardService(scoreStore, eventManager, log("Leaderboard"));

  const registry = new ToolRegistry(
    { sessionManager, pitchScorer, eventManager, leaderboard },
    log("Tools"),
  );
  init.info("Tools registered", { count: registry.names().length });

  return createAppServer({ registry, sessionManager, audioStorage, logger: log("Server") });
}

export async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logFatal(`${err.message}\nAdd the missing values to your .env file.`);
      process.exit(1);
    }
    throw err;
  }

  const server = buildApp(config);
  const port = await server.listen(config.port);
  const init = createConsoleLogger("Init", config.logLevel);
  init.info(`${APP_NAME} v${APP_VERSION} running at ${config.publicBaseUrl}`, { port });

  const shutdown = (signal: string) => {
    init.info("Shutting down", { signal });
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// Start only when run directly, not when imported by tests.
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logFatal(errorMessage(err));
    process.exit(1);
  });
}
