#!/usr/bin/env node
// Initialize logger first (overrides console methods)
import { installConsoleLogger, setLogLevel } from "./logger.js";

import { serve } from "@hono/node-server";
import {
  getConfig,
  getConfigPath,
  getDbPath,
  SERVER_PORT,
  SERVER_VERSION,
  onConfigChange,
  startConfigWatcher,
  stopConfigWatcher,
  updateConfig,
  type Config,
} from "./config.js";
import { createApp } from "./app.js";
import { SqliteItemStore } from "./database.js";
import { ClaudeSentenceGenerator } from "./generator.js";
import { SessionRegistry } from "./registry.js";
import { IdleSessionReaper } from "./session-reaper.js";

installConsoleLogger();

const MINUTE_MS = 60 * 1000;

function createGenerator(config: Config): ClaudeSentenceGenerator {
  return new ClaudeSentenceGenerator({
    model: config.model,
    claudeExecutablePath: config.claudeExecutablePath || undefined,
    retry: { maxRetries: config.generationRetries },
  });
}

const config = getConfig();

// Set log level from config
setLogLevel(config.logLevel);

const store = new SqliteItemStore(getDbPath(config));
let generator = createGenerator(config);

const registry = new SessionRegistry(() => {
  const current = getConfig();
  return {
    maxItems: current.maxItemsPerSession,
    distractorCount: current.distractorCount,
    generator,
  };
});

const sessions = new IdleSessionReaper(registry, {
  idleTimeoutMs: config.idleTimeoutMinutes * MINUTE_MS,
  sweepIntervalMs: config.cleanupIntervalMinutes * MINUTE_MS,
});

// Register config change listener
onConfigChange((newConfig) => {
  setLogLevel(newConfig.logLevel);
  sessions.setIdleTimeout(newConfig.idleTimeoutMinutes * MINUTE_MS);
  sessions.setSweepInterval(newConfig.cleanupIntervalMinutes * MINUTE_MS);
  generator = createGenerator(newConfig);
});

const app = createApp({
  sessions,
  store,
  version: SERVER_VERSION,
  config: { get: getConfig, update: updateConfig, path: getConfigPath() },
});

console.info(`Recallkit server v${SERVER_VERSION} running on http://localhost:${SERVER_PORT}`);
console.info(`Config: ${getConfigPath()}`);
console.info(`Database: ${getDbPath(config)}`);
console.info(`Log level: ${config.logLevel}`);

// Start config file watcher for hot reload
startConfigWatcher();

// Start idle session eviction
sessions.start();

const server = serve({
  port: SERVER_PORT,
  fetch: app.fetch,
});

// Graceful shutdown (SIGTERM)
async function gracefulShutdown(): Promise<void> {
  console.info("Shutting down gracefully...");

  // Stop accepting new connections
  server.close();

  sessions.stop();

  // End live sessions so their summaries are logged
  for (const userId of sessions.userIds()) {
    await sessions.end(userId);
  }

  // Stop config watcher
  stopConfigWatcher();

  // Close database
  store.close();

  console.info("Shutdown complete");
  process.exit(0);
}

// Force shutdown (SIGINT / Ctrl+C)
function forceShutdown(): void {
  console.warn("Force shutdown...");
  process.exit(0);
}

process.on("SIGTERM", () => {
  gracefulShutdown().catch((error: unknown) => {
    console.error("Shutdown failed:", error);
    process.exit(1);
  });
});
process.on("SIGINT", forceShutdown);
