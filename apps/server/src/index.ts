import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { SqliteAnalysisStore } from "./db/analysis-store.js";
import { openDatabase } from "./db/index.js";
import { SqliteTagStore } from "./db/tag-store.js";
import { FileVault } from "./lib/file-vault.js";
import { createLogger, moduleLogger } from "./lib/logger.js";
import { InferenceDispatcher, unconfiguredInferenceClient } from "./services/inference-dispatcher.js";
import { PersistenceCoordinator } from "./services/persistence-coordinator.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const database = openDatabase(config.databaseUrl);
const store = new SqliteAnalysisStore(database.db);
const tags = new SqliteTagStore(database.db);
const vault = new FileVault(config.vaultDirCandidates, moduleLogger(logger, "vault"));
const coordinator = new PersistenceCoordinator({
  store,
  tags,
  vault,
  logger: moduleLogger(logger, "coordinator"),
});
const dispatcher = new InferenceDispatcher(
  coordinator,
  unconfiguredInferenceClient,
  moduleLogger(logger, "inference"),
);

const unresolved = await coordinator.findUnresolved();
for (const id of unresolved) {
  try {
    await coordinator.reconcile(id);
  } catch (err) {
    logger.warn({ analysisId: id, err }, "analysis still unresolved after startup reconcile");
  }
}

const app = createApp({
  coordinator,
  dispatcher,
  tags,
  uploadDir: config.recordingTmpDir,
  logger: moduleLogger(logger, "http"),
});

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info(`VoiceLens server listening on http://localhost:${info.port}`);
  },
);

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close(() => {
    database.close();
    process.exit(0);
  });
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));
