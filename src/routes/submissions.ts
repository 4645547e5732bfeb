// src/routes/submissions.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { actorOf } from "../middleware/auth";
import { ENTITY } from "../services";
import {
  parseContent,
  parseFeedback,
  parseGradeInput,
  parseNewSubmission,
} from "../validators/submission";
import type { RouteDeps } from "./types";

export function createSubmissionsRouter({ services, auth }: RouteDeps) {
  const router = Router();
  const { submissions, audit, refs } = services;

  router.use(auth.requireAuth);

  // Creation is covered by the request audit trail; no domain event
  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const { assignment, content } = parseNewSubmission(req.body);
      const submission = await submissions.create(assignment, actorOf(req), content);
      res.status(201).json({ submission });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json({ submission: await submissions.view(req.params.id, actorOf(req)) });
    })
  );

  router.patch(
    "/:id",
    asyncHandler(async (req, res) => {
      const submission = await submissions.editContent(req.params.id, parseContent(req.body), actorOf(req));
      res.json({ submission });
    })
  );

  router.post(
    "/:id/submit",
    asyncHandler(async (req, res) => {
      const submission = await submissions.submit(req.params.id, actorOf(req));

      await audit.recordRequest(req, {
        action: "submission",
        description: `Submitted work for assignment ${submission.assignment}`,
        target: refs.refTo(ENTITY.submission, submission.id),
        extra: { isLate: submission.isLate, daysLate: submission.daysLate },
      });

      res.json({ submission });
    })
  );

  router.post(
    "/:id/grade",
    auth.requireCapability("grade"),
    asyncHandler(async (req, res) => {
      const submission = await submissions.grade(req.params.id, parseGradeInput(req.body), actorOf(req));

      await audit.recordRequest(req, {
        action: "grade_submitted",
        description: `Graded submission ${submission.id}: ${submission.pointsEarned}`,
        target: refs.refTo(ENTITY.submission, submission.id),
        extra: {
          student: submission.student,
          pointsEarned: submission.pointsEarned,
          percentageScore: submission.percentageScore,
          isPassing: submission.isPassing,
          effectiveScore: submission.effectiveScore,
        },
      });

      res.json({ submission });
    })
  );

  router.post(
    "/:id/return",
    auth.requireCapability("grade"),
    asyncHandler(async (req, res) => {
      const submission = await submissions.returnForRevision(
        req.params.id,
        parseFeedback(req.body),
        actorOf(req)
      );

      await audit.recordRequest(req, {
        action: "update",
        description: `Returned submission ${submission.id} for revision`,
        target: refs.refTo(ENTITY.submission, submission.id),
      });

      res.json({ submission });
    })
  );

  return router;
}
