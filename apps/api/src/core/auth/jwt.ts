import jwt from "jsonwebtoken";
import { z } from "zod";

import { ENV } from "../../config/env";

const AccessTokenPayloadSchema = z.object({
  sub: z.string().optional(),
  userId: z.string().uuid(),
  role: z.enum(["admin", "traveler"]),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type AuthAccessTokenPayload = z.infer<typeof AccessTokenPayloadSchema>;

// Tokens are issued by the identity service with the shared secret.
export function verifyAccessToken(token: string): AuthAccessTokenPayload {
  return AccessTokenPayloadSchema.parse(jwt.verify(token, ENV.JWT_SECRET));
}
