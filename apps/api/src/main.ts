import { startServer } from "./core/http/server";
import { closeDatabase, sanitizedDatabaseConfig } from "./core/database/client";
import { logger } from "./core/logger";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

if (sanitizedDatabaseConfig) {
  logger.info("[DB] Using database config (sanitized)", sanitizedDatabaseConfig);
} else {
  logger.error("[DB] Failed to parse DATABASE_URL");
}

startServer()
  .then((server) => {
    const shutdown = (signal: string) => {
      logger.info("Shutting down TripNest API", { signal });
      server
        .close()
        .then(() => closeDatabase())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed", { error: errorMessage(error) });
          process.exit(1);
        });
    };
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.once("SIGINT", () => shutdown("SIGINT"));
  })
  .catch((error: unknown) => {
    logger.error("Failed to start TripNest API server", { error: errorMessage(error) });
    process.exit(1);
  });
