// src/services/index.ts
import type { Clock } from "../lib/clock";
import { AuditRecorder } from "../lib/auditLogger";
import { EntityRefRegistry } from "../lib/entityRefs";
import type { Repositories } from "../repositories/types";
import { AssignmentService } from "./assignmentService";
import { CourseService } from "./courseService";
import { SubmissionWorkflow } from "./submissionWorkflow";
import { UserService } from "./userService";

export interface ServiceOptions {
  allowDraftGrading: boolean;
  bcryptRounds: number;
}

export interface Services {
  refs: EntityRefRegistry;
  audit: AuditRecorder;
  users: UserService;
  courses: CourseService;
  assignments: AssignmentService;
  submissions: SubmissionWorkflow;
}

/** Entity tags audit entries may point at. */
export const ENTITY = {
  user: "user",
  course: "course",
  assignment: "assignment",
  submission: "submission",
} as const;

export const createServices = (repos: Repositories, clock: Clock, options: ServiceOptions): Services => {
  const refs = new EntityRefRegistry()
    .register(ENTITY.user, (id) => repos.users.findById(id))
    .register(ENTITY.course, (id) => repos.courses.findById(id))
    .register(ENTITY.assignment, (id) => repos.assignments.findById(id))
    .register(ENTITY.submission, (id) => repos.submissions.findById(id));

  return {
    refs,
    audit: new AuditRecorder(repos.auditLogs, clock, refs),
    users: new UserService(repos.users, options.bcryptRounds),
    courses: new CourseService(repos.courses, repos.users, clock),
    assignments: new AssignmentService(repos.assignments, repos.courses, clock),
    submissions: new SubmissionWorkflow(
      { submissions: repos.submissions, assignments: repos.assignments, courses: repos.courses, clock },
      { allowDraftGrading: options.allowDraftGrading }
    ),
  };
};
