import type { FastifyRequest } from "fastify";

import type { Actor } from "../../modules/users/users.schema";
import { verifyAccessToken } from "../auth/jwt";
import { AppError } from "../errors";

export type AuthenticatedUser = NonNullable<FastifyRequest["user"]>;

export async function authGuard(request: FastifyRequest): Promise<void> {
  const authorization = request.headers.authorization;

  if (!authorization || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "Unauthorized", "unauthorized");
  }

  const token = authorization.replace("Bearer ", "").trim();

  try {
    const { userId, role } = verifyAccessToken(token);
    request.user = { id: userId, role };
  } catch {
    throw new AppError(401, "Invalid or expired token", "unauthorized");
  }
}

export async function adminGuard(request: FastifyRequest): Promise<void> {
  if (request.user?.role !== "admin") {
    throw new AppError(403, "Forbidden", "forbidden");
  }
}

export function requireUser(request: FastifyRequest): AuthenticatedUser {
  if (!request.user) {
    throw new AppError(401, "Unauthorized", "unauthorized");
  }
  return request.user;
}

export function requireActor(request: FastifyRequest): Actor {
  const user = requireUser(request);
  return { userId: user.id, role: user.role };
}
