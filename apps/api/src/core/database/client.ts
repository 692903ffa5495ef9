import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import { ENV } from "../../config/env";
import { logger } from "../logger";

const connectionString = ENV.DATABASE_URL;

export const sanitizedDatabaseConfig = (() => {
  try {
    const url = new URL(connectionString);
    return {
      host: url.hostname,
      port: url.port || "5432",
      database: url.pathname.replace(/^\//, ""),
      user: url.username,
    };
  } catch {
    return null;
  }
})();

const pool = new Pool({ connectionString });
pool.on("error", (error) => {
  logger.error("[DB] Pool error", {
    module: "database",
    code: "code" in error ? String(error.code) : undefined,
    message: error.message,
    stack: error.stack,
    config: sanitizedDatabaseConfig ?? undefined,
  });
});

export const db = drizzle(pool);
export type DatabaseClient = typeof db;
export type DbTransaction = Parameters<Parameters<DatabaseClient["transaction"]>[0]>[0];
export type DbSession = DatabaseClient | DbTransaction;

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
