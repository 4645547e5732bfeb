// src/routes/assignments.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { actorOf } from "../middleware/auth";
import { parseAssignmentChanges, parseAssignmentInput } from "../validators/assignment";
import type { RouteDeps } from "./types";

export function createAssignmentsRouter({ services, auth }: RouteDeps) {
  const router = Router();
  const { assignments, submissions } = services;

  router.use(auth.requireAuth);

  router.post(
    "/",
    auth.requireCapability("manage_assignments"),
    asyncHandler(async (req, res) => {
      const assignment = await assignments.create(parseAssignmentInput(req.body), actorOf(req));
      res.status(201).json({ assignment });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json({ assignment: await assignments.get(req.params.id) });
    })
  );

  router.patch(
    "/:id",
    auth.requireCapability("manage_assignments"),
    asyncHandler(async (req, res) => {
      const assignment = await assignments.update(
        req.params.id,
        parseAssignmentChanges(req.body),
        actorOf(req)
      );
      res.json({ assignment });
    })
  );

  router.get(
    "/:id/submissions",
    auth.requireCapability("grade"),
    asyncHandler(async (req, res) => {
      res.json({ data: await submissions.listForAssignment(req.params.id, actorOf(req)) });
    })
  );

  return router;
}
