// src/repositories/index.ts
import { MongoAssignmentRepository } from "./assignmentRepository";
import { MongoAuditLogRepository } from "./auditLogRepository";
import { MongoCourseRepository } from "./courseRepository";
import { MongoSubmissionRepository } from "./submissionRepository";
import { MongoUserRepository } from "./userRepository";
import type { Repositories } from "./types";

export * from "./types";

export const createMongoRepositories = (): Repositories => ({
  users: new MongoUserRepository(),
  courses: new MongoCourseRepository(),
  assignments: new MongoAssignmentRepository(),
  submissions: new MongoSubmissionRepository(),
  auditLogs: new MongoAuditLogRepository(),
});
