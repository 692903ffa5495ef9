import { randomUUID } from "crypto";

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

import { ENV } from "../../config/env";
import { verifyAccessToken } from "../auth/jwt";

import { requestCounter, requestDuration } from "./metrics";

type RateLimitTier = "public" | "auth" | "webhook";

const RATE_LIMITS: Record<RateLimitTier, { limit: number; windowMs: number }> = {
  public: { limit: 60, windowMs: 60_000 },
  auth: { limit: 120, windowMs: 60_000 },
  webhook: { limit: 300, windowMs: 60_000 },
};

const DEFAULT_TIMEOUT_MS = 10_000;
// Verification may run every gateway attempt before answering.
const PAYMENTS_TIMEOUT_MS =
  ENV.CHAPA_TIMEOUT_MS * ENV.GATEWAY_MAX_ATTEMPTS + ENV.GATEWAY_RETRY_BASE_DELAY_MS * 6 + 5_000;

type Bucket = { count: number; expiresAt: number };
const rateStore = new Map<string, Bucket>();
const RATE_STORE_CLEANUP_INTERVAL_MS = 60_000;

setInterval(() => {
  const now = Date.now();
  for (const [key, bucket] of rateStore.entries()) {
    if (bucket.expiresAt <= now) {
      rateStore.delete(key);
    }
  }
}, RATE_STORE_CLEANUP_INTERVAL_MS).unref();

function identifyTier(request: FastifyRequest): RateLimitTier {
  if (request.url.startsWith("/payments/webhook")) {
    return "webhook";
  }

  if (typeof request.headers.authorization === "string") {
    return "auth";
  }

  return "public";
}

function simpleHash(value: string): string {
  let hash = 0;
  for (let index = 0; index < value.length; index += 1) {
    hash = (hash * 31 + value.charCodeAt(index)) | 0;
  }
  return `${hash}`;
}

function resolveRouteGroup(request: FastifyRequest): string {
  const pathname = request.url.split("?")[0] ?? "/";
  const segments = pathname.split("/").filter(Boolean).slice(0, 2);
  return segments.length ? segments.join("/") : "root";
}

// Runs before authGuard, so the actor comes from the bearer token itself.
function resolveActor(request: FastifyRequest): string {
  const authorization = request.headers.authorization;
  if (!authorization?.startsWith("Bearer ")) {
    return "anonymous";
  }
  try {
    return verifyAccessToken(authorization.slice("Bearer ".length).trim()).userId;
  } catch {
    return "anonymous";
  }
}

function getRateKey(tier: RateLimitTier, request: FastifyRequest): string {
  const uaHeader = Array.isArray(request.headers["user-agent"])
    ? request.headers["user-agent"][0] ?? ""
    : request.headers["user-agent"] ?? "";
  const uaHash = simpleHash(String(uaHeader));
  const routeGroup = resolveRouteGroup(request);
  const actor = resolveActor(request);
  return `${tier}:${actor}:${request.ip}:${uaHash}:${routeGroup}`;
}

function enforceRateLimit(request: FastifyRequest, reply: FastifyReply): boolean {
  const tier = identifyTier(request);
  const { limit, windowMs } = RATE_LIMITS[tier];
  const key = getRateKey(tier, request);
  const now = Date.now();
  const bucket = rateStore.get(key);

  if (!bucket || bucket.expiresAt < now) {
    rateStore.set(key, { count: 1, expiresAt: now + windowMs });
    return true;
  }

  if (bucket.count >= limit) {
    reply.status(429).send({
      code: "rate_limit_exceeded",
      message: "Too many requests",
      details: { tier, limit, windowSeconds: Math.ceil(windowMs / 1000) },
    });
    return false;
  }

  bucket.count += 1;
  return true;
}

function applyTimeout(request: FastifyRequest, reply: FastifyReply): void {
  const timeoutMs = request.url.startsWith("/payments") ? PAYMENTS_TIMEOUT_MS : DEFAULT_TIMEOUT_MS;
  let completed = false;

  const timer = setTimeout(() => {
    if (completed) return;
    completed = true;
    reply.status(504).send({ code: "timeout", message: "Request timed out" });
  }, timeoutMs);

  const clear = () => {
    if (completed) return;
    completed = true;
    clearTimeout(timer);
  };

  reply.raw.on("close", clear);
  reply.raw.on("finish", clear);
}

export function registerMiddleware(app: FastifyInstance): void {
  app.addHook("onRequest", async (request, reply) => {
    const traceId = request.headers["x-request-id"]
      ? String(request.headers["x-request-id"])
      : randomUUID();
    request.headers["x-request-id"] = traceId;
    reply.header("x-request-id", traceId);
    request.log = request.log.child({ traceId });

    if (!enforceRateLimit(request, reply)) {
      return reply; // response already sent
    }

    applyTimeout(request, reply);
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions?.url ?? request.url;
    requestCounter.inc({
      method: request.method,
      route,
      status: String(reply.statusCode),
    });
    requestDuration.observe({ method: request.method, route }, reply.elapsedTime / 1000);
  });
}
