import type { FastifyInstance } from "fastify";
import { sql } from "drizzle-orm";

import { ENV } from "../../../config/env";
import { adminGuard, authGuard } from "../auth-guard";
import { logger } from "../../logger";
import { db } from "../../database/client";
import { getMetricsSnapshot } from "../../metrics";
import { getMetrics, metricsContentType } from "../metrics";

export type InternalRouteOptions = {
  paymentProvider: string;
  checkDatabase?: () => Promise<void>;
};

async function pingDatabase(): Promise<void> {
  await db.execute(sql`select 1`);
}

export async function registerInternalRoutes(
  app: FastifyInstance,
  options: InternalRouteOptions
): Promise<void> {
  const checkDatabase = options.checkDatabase ?? pingDatabase;

  app.get(
    "/internal/metrics",
    { preHandler: [authGuard, adminGuard] },
    async (_request, reply) => {
      const metrics = getMetricsSnapshot();
      reply.header("Content-Type", "application/json");
      return reply.send(metrics);
    }
  );

  app.get("/internal/metrics/prometheus", async (_request, reply) => {
    reply.header("Content-Type", metricsContentType);
    return reply.send(await getMetrics());
  });

  app.get("/internal/health", async (_request, reply) => {
    let dbStatus: "ok" | "down" = "ok";

    try {
      await checkDatabase();
    } catch (error) {
      dbStatus = "down";
      logger.error("Healthcheck: database down", {
        module: "health",
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const payload = {
      status: dbStatus === "ok" ? "ok" : "degraded",
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      version: process.env.BUILD_ID ?? "unknown",
      services: {
        database: dbStatus,
        payment_provider: options.paymentProvider,
        webhook_signature: ENV.CHAPA_WEBHOOK_SECRET ? "enforced" : "disabled",
        read_only: ENV.TRIPNEST_READONLY,
      },
    };

    return reply.send(payload);
  });
}
