// src/lib/jwt.ts
import jwt, { type JwtPayload } from "jsonwebtoken";
import type { Response } from "express";
import config from "../config/config";
import { AuthenticationError } from "./errors";
import { USER_ROLES, isOneOf, type UserRecord, type UserRole } from "../types/domain";

export interface TokenPayload {
  id: string;
  role: UserRole;
  version: number;
}

export const AUTH_COOKIE = "token";

export const signToken = (user: Pick<UserRecord, "id" | "role" | "tokenVersion">): string =>
  jwt.sign({ id: user.id, role: user.role, version: user.tokenVersion }, config.jwtSecret, {
    expiresIn: config.jwtTtlSeconds,
  });

// HttpOnly cookie for browsers; the same token is returned in the body for API clients
export const setAuthCookie = (res: Response, token: string) => {
  res.cookie(AUTH_COOKIE, token, {
    httpOnly: true,
    sameSite: "strict",
    secure: config.nodeEnv === "production",
    maxAge: config.jwtTtlSeconds * 1000,
  });
};

export const clearAuthCookie = (res: Response) => {
  res.clearCookie(AUTH_COOKIE, {
    httpOnly: true,
    sameSite: "strict",
    secure: config.nodeEnv === "production",
  });
};

export const verifyToken = (token: string): TokenPayload => {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, config.jwtSecret);
  } catch {
    throw new AuthenticationError("Session expired or invalid");
  }

  if (
    typeof decoded === "string" ||
    typeof decoded.id !== "string" ||
    !isOneOf(USER_ROLES, decoded.role) ||
    typeof decoded.version !== "number"
  ) {
    throw new AuthenticationError("Invalid token");
  }
  return { id: decoded.id, role: decoded.role, version: decoded.version };
};
