// src/routes/courses.ts
import { Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { actorOf } from "../middleware/auth";
import { ENTITY } from "../services";
import { parseCourseInput } from "../validators/course";
import { FieldReader } from "../validators/fields";
import type { RouteDeps } from "./types";

export function createCoursesRouter({ services, auth }: RouteDeps) {
  const router = Router();
  const { courses, assignments, audit, refs } = services;

  router.use(auth.requireAuth);

  router.post(
    "/",
    auth.requireCapability("manage_courses"),
    asyncHandler(async (req, res) => {
      const course = await courses.create(parseCourseInput(req.body), actorOf(req));
      res.status(201).json({ course });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      res.json({ course: await courses.get(req.params.id) });
    })
  );

  router.post(
    "/:id/enroll",
    asyncHandler(async (req, res) => {
      const body = new FieldReader(req.body);
      const studentId = body.optString("student");
      body.assertValid();

      const enrollment = await courses.enroll(req.params.id, studentId, actorOf(req));

      await audit.recordRequest(req, {
        action: "enrollment",
        description: `Enrolled student ${enrollment.student}`,
        target: refs.refTo(ENTITY.course, enrollment.course),
        extra: { student: enrollment.student },
      });

      res.status(201).json({ enrollment });
    })
  );

  router.get(
    "/:id/assignments",
    asyncHandler(async (req, res) => {
      res.json({ data: await assignments.listForCourse(req.params.id) });
    })
  );

  return router;
}
