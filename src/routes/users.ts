// src/routes/users.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { actorOf } from "../middleware/auth";
import { parseAdminUserChanges, parseProfileChanges } from "../validators/user";
import type { RouteDeps } from "./types";

export function createUsersRouter({ services, auth }: RouteDeps) {
  const router = Router();
  const { users } = services;

  router.use(auth.requireAuth);

  // Self-service contract: name, phone and bio only
  router.patch(
    "/me",
    asyncHandler(async (req, res) => {
      const user = await users.updateProfile(actorOf(req), parseProfileChanges(req.body));
      res.json({ user });
    })
  );

  router.get(
    "/",
    auth.requireCapability("manage_users"),
    asyncHandler(async (_req, res) => {
      res.json({ data: await users.list() });
    })
  );

  router.get(
    "/:id",
    auth.requireCapability("manage_users"),
    asyncHandler(async (req, res) => {
      res.json({ user: await users.get(req.params.id) });
    })
  );

  // Admin contract: everything in the profile plus email, role and status
  router.patch(
    "/:id",
    auth.requireCapability("manage_users"),
    asyncHandler(async (req, res) => {
      const user = await users.adminUpdate(req.params.id, parseAdminUserChanges(req.body));
      res.json({ user });
    })
  );

  return router;
}
