import http from "node:http";
import { loadConfig } from "./config/env";
import { SHUTDOWN_GRACE_MS } from "./config/server";
import { createDatabase, type DatabaseHandle } from "./db";
import logger from "./logger";
import { createApp } from "./app";
import { createServices } from "./services";
import { DbStorage } from "./storage/dbStorage";
import { MemStorage } from "./storage/memStorage";
import type { IStorage } from "./storage/types";

const config = loadConfig();
logger.configure({
  level: config.logLevel,
  bindings: { service: config.appName, env: config.nodeEnv },
});

let database: DatabaseHandle | undefined;
let storage: IStorage;

if (config.database.url) {
  database = createDatabase(config.database);
  storage = new DbStorage(database.db);
} else {
  logger.warn("DATABASE_URL not set, using the in-process store; data is lost on restart");
  storage = new MemStorage();
}

const app = createApp(config, createServices(config, storage));
const server = http.createServer(app);

server.listen(config.server.port, config.server.host, () => {
  logger.info("Server listening", {
    host: config.server.host,
    port: config.server.port,
    env: config.nodeEnv,
    workers: config.workers.baseUrl,
  });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down", { signal });

  const forceExit = setTimeout(() => {
    logger.error("Forced shutdown after grace period", { graceMs: SHUTDOWN_GRACE_MS });
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forceExit.unref();

  await new Promise<void>((resolve) => server.close(() => resolve()));
  await database?.close();
  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.fatal("Shutdown failed", { error });
      process.exit(1);
    });
  });
}
