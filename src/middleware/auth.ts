// src/middleware/auth.ts
import type { Request } from "express";
import { asyncHandler } from "./asyncHandler";
import { AUTH_COOKIE, clearAuthCookie, verifyToken } from "../lib/jwt";
import type { AuditRecorder } from "../lib/auditLogger";
import { hasCapability, type Capability } from "../lib/capabilities";
import { AuthenticationError, AuthorizationError } from "../lib/errors";
import type { UserRepository } from "../repositories/types";
import type { Actor } from "../types/domain";
import type { AuthUser } from "../types/express";

const readToken = (req: Request): string | undefined => {
  const cookie: unknown = req.cookies?.[AUTH_COOKIE];
  if (typeof cookie === "string" && cookie) return cookie;

  const header = req.get("authorization");
  if (header?.startsWith("Bearer ")) return header.slice("Bearer ".length).trim();
  return undefined;
};

/** The identity `requireAuth` attached. Throws when the route forgot to require it. */
export const currentUser = (req: Request): AuthUser => {
  if (!req.user) throw new AuthenticationError();
  return req.user;
};

export const actorOf = (req: Request): Actor => {
  const user = currentUser(req);
  return { id: user.id, role: user.role };
};

export function createAuth({ users, audit }: { users: UserRepository; audit: AuditRecorder }) {
  const requireAuth = asyncHandler(async (req, res, next) => {
    const token = readToken(req);
    if (!token) throw new AuthenticationError("Not authenticated");

    const payload = verifyToken(token);

    // Re-read the user on every request so suspensions and password
    // changes take effect before the token expires
    const user = await users.findById(payload.id);
    if (!user) throw new AuthenticationError("User not found");

    if (user.status === "suspended") {
      clearAuthCookie(res);
      throw new AuthorizationError("Session revoked. Account suspended.");
    }
    if (payload.version !== user.tokenVersion) {
      clearAuthCookie(res);
      throw new AuthenticationError("Session expired due to security update.");
    }

    req.user = user;
    next();
  });

  const requireCapability = (capability: Capability) =>
    asyncHandler(async (req, _res, next) => {
      const user = currentUser(req);
      if (!hasCapability(user.role, capability)) {
        await audit.recordRequest(req, {
          action: "access_denied",
          description: `${user.role} lacks ${capability}`,
          success: false,
          errorMessage: "Forbidden: insufficient role",
        });
        throw new AuthorizationError("Forbidden: insufficient role");
      }
      next();
    });

  return { requireAuth, requireCapability };
}

export type AuthMiddleware = ReturnType<typeof createAuth>;
