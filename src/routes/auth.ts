// src/routes/auth.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { actorOf, currentUser } from "../middleware/auth";
import { createLoginRateLimiter } from "../middleware/security";
import { clearAuthCookie, setAuthCookie, signToken } from "../lib/jwt";
import type { UserRecord } from "../types/domain";
import { ENTITY } from "../services";
import { parseCredentials, parsePasswordChange, parseRegistration } from "../validators/user";
import type { RouteDeps } from "./types";

export function createAuthRouter({ services, auth }: RouteDeps) {
  const router = Router();
  const { users, audit, refs } = services;

  // 📝 Register (students and lecturers; admins are created by admins)
  router.post(
    "/register",
    asyncHandler(async (req, res) => {
      const user = await users.register(parseRegistration(req.body));

      await audit.recordRequest(req, {
        actor: user.id,
        action: "create",
        description: `Registered ${user.role} ${user.email}`,
        target: refs.refTo(ENTITY.user, user.id),
      });

      res.status(201).json({ user });
    })
  );

  // 🔑 Login
  router.post(
    "/login",
    createLoginRateLimiter(),
    asyncHandler(async (req, res) => {
      const { email, password } = parseCredentials(req.body);

      let user: UserRecord;
      try {
        user = await users.authenticate(email, password);
      } catch (err) {
        await audit.recordRequest(req, {
          actor: null,
          action: "login",
          description: `Failed login for ${email}`,
          success: false,
          errorMessage: err instanceof Error ? err.message : "Login failed",
        });
        throw err;
      }

      const token = signToken(user);
      setAuthCookie(res, token);

      await audit.recordRequest(req, {
        actor: user.id,
        action: "login",
        description: `Login ${user.email}`,
        target: refs.refTo(ENTITY.user, user.id),
      });

      res.json({ message: "Login successful", token, user });
    })
  );

  // 👤 Current user
  router.get(
    "/me",
    auth.requireAuth,
    asyncHandler(async (req, res) => {
      res.json({ user: currentUser(req) });
    })
  );

  // 🚪 Logout
  router.post(
    "/logout",
    auth.requireAuth,
    asyncHandler(async (req, res) => {
      const actor = actorOf(req);
      clearAuthCookie(res);

      await audit.recordRequest(req, {
        action: "logout",
        description: "Logout",
        target: refs.refTo(ENTITY.user, actor.id),
      });

      res.json({ message: "Logged out" });
    })
  );

  // 🔒 Change password. Bumps tokenVersion, so every issued token dies.
  router.post(
    "/change-password",
    auth.requireAuth,
    asyncHandler(async (req, res) => {
      await users.changePassword(actorOf(req), parsePasswordChange(req.body));
      clearAuthCookie(res);

      res.json({ message: "Password updated. Please log in again." });
    })
  );

  return router;
}
