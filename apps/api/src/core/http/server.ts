import Fastify, { type FastifyInstance } from "fastify";
import { ZodError } from "zod";

import { AppError } from "../errors";
import { logger } from "../logger";
import { ENV } from "../../config/env";

import { registerMiddleware } from "./middleware";
import { registerRoutes, type RouteDependencies } from "./router";

type ErrorResponse = {
  error: {
    code: string;
    message: string;
    status: number;
    details?: unknown;
  };
};

function buildErrorResponse(
  status: number,
  code: string,
  message: string,
  details?: unknown
): ErrorResponse {
  return {
    error: {
      code,
      message,
      status,
      ...(details === undefined ? {} : { details }),
    },
  };
}

export async function createServer(
  dependencies: Partial<RouteDependencies> = {}
): Promise<FastifyInstance> {
  const trustProxy = process.env.TRUST_PROXY === "true";
  const app = Fastify({
    logger: ENV.NODE_ENV !== "test",
    trustProxy,
    bodyLimit: ENV.HTTP_BODY_LIMIT_BYTES,
  });

  // Keeps the body text for webhook signature checks.
  app.removeContentTypeParser("application/json");
  app.addContentTypeParser("application/json", { parseAs: "string" }, (request, body, done) => {
    const text = typeof body === "string" ? body : body.toString("utf8");
    request.rawBody = text;
    if (!text.trim()) {
      done(new AppError(400, "Request body must not be empty", "empty_json_body"), undefined);
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(new AppError(400, "Body is not valid JSON", "invalid_json"), undefined);
    }
  });

  registerMiddleware(app);
  await registerRoutes(app, dependencies);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const status = 400;
      return reply
        .status(status)
        .send(buildErrorResponse(status, "validation_error", "Invalid request", error.issues));
    }

    if (error instanceof AppError) {
      const status = error.statusCode;
      const log = status >= 500 ? logger.error : logger.warn;
      log(error.message, {
        module: "http",
        route: request.url,
        method: request.method,
        status,
        code: error.code,
      });
      return reply
        .status(status)
        .send(buildErrorResponse(status, error.code, error.message, error.details));
    }

    // Fastify's own errors (bad JSON, body too large) carry a 4xx status.
    const status =
      typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500
        ? error.statusCode
        : 500;
    if (status < 500) {
      return reply
        .status(status)
        .send(buildErrorResponse(status, error.code ?? "bad_request", error.message));
    }

    logger.error(error.message || "Unexpected error", {
      module: "http",
      route: request.url,
      method: request.method,
      status,
      stack: error.stack,
    });
    return reply
      .status(status)
      .send(buildErrorResponse(status, "unexpected_error", "Internal server error"));
  });

  return app;
}

export async function startServer(): Promise<FastifyInstance> {
  const server = await createServer();
  const port = ENV.PORT;
  await server.listen({ port, host: "0.0.0.0" });
  server.log.info(`TripNest API listening on port ${port}`);
  return server;
}
