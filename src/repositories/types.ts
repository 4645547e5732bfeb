// src/repositories/types.ts
// Storage contracts the services depend on. MongoDB implementations live
// beside this file; tests swap in in-memory ones. Keys left undefined in a
// *Changes object are ignored, never cleared.
import type {
  AssignmentRecord,
  AuditAction,
  AuditLogRecord,
  CourseRecord,
  EnrollmentRecord,
  NewAuditLog,
  SubmissionRecord,
  UserRecord,
  UserRole,
  UserStatus,
  UserWithPassword,
} from "../types/domain";

export interface NewUser {
  email: string;
  password: string; // already hashed
  firstName: string;
  lastName: string;
  role: UserRole;
  phoneNumber?: string;
  bio?: string;
}

export interface UserChanges {
  email?: string;
  firstName?: string;
  lastName?: string;
  role?: UserRole;
  status?: UserStatus;
  phoneNumber?: string;
  bio?: string;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByIdWithPassword(id: string): Promise<UserWithPassword | null>;
  findByEmailWithPassword(email: string): Promise<UserWithPassword | null>;
  /** @throws ConflictError when the email is taken */
  create(input: NewUser): Promise<UserRecord>;
  update(id: string, changes: UserChanges): Promise<UserRecord | null>;
  /** Stores a new hash and bumps tokenVersion, revoking issued tokens. */
  setPassword(id: string, passwordHash: string): Promise<void>;
  list(): Promise<UserRecord[]>;
}

export type NewCourse = Omit<CourseRecord, "id">;

export interface CourseRepository {
  create(input: NewCourse): Promise<CourseRecord>;
  findById(id: string): Promise<CourseRecord | null>;
  /** @throws ConflictError when the student is already enrolled */
  enroll(courseId: string, studentId: string, at: Date): Promise<EnrollmentRecord>;
  countActiveEnrollments(courseId: string): Promise<number>;
  isEnrolled(courseId: string, studentId: string): Promise<boolean>;
  isTeaching(courseId: string, userId: string): Promise<boolean>;
}

export type NewAssignment = Omit<AssignmentRecord, "id" | "createdAt">;
export type AssignmentChanges = Partial<
  Omit<AssignmentRecord, "id" | "course" | "createdBy" | "createdAt">
>;

export interface AssignmentRepository {
  create(input: NewAssignment, at: Date): Promise<AssignmentRecord>;
  findById(id: string): Promise<AssignmentRecord | null>;
  update(id: string, changes: AssignmentChanges): Promise<AssignmentRecord | null>;
  listByCourse(courseId: string): Promise<AssignmentRecord[]>;
}

export type NewSubmission = Omit<SubmissionRecord, "id" | "version">;
export type SubmissionChanges = Partial<
  Pick<
    SubmissionRecord,
    "content" | "status" | "pointsEarned" | "feedback" | "gradedBy" | "submittedAt" | "gradedAt"
  >
>;

export interface SubmissionRepository {
  /** @throws ConflictError when (assignment, student) already has a row */
  insert(input: NewSubmission): Promise<SubmissionRecord>;
  findById(id: string): Promise<SubmissionRecord | null>;
  findByPair(assignmentId: string, studentId: string): Promise<SubmissionRecord | null>;
  listByAssignment(assignmentId: string): Promise<SubmissionRecord[]>;
  /**
   * Applies `changes` only if the stored row still carries `expectedVersion`,
   * bumping the version. Returns null when another write got there first.
   */
  updateIfVersion(
    id: string,
    expectedVersion: number,
    changes: SubmissionChanges
  ): Promise<SubmissionRecord | null>;
}

export interface AuditLogFilter {
  user?: string;
  action?: AuditAction;
  targetType?: string;
  targetId?: string;
  from?: Date;
  to?: Date;
}

export interface AuditLogQuery extends AuditLogFilter {
  page: number;
  limit: number;
  sort: "asc" | "desc";
}

export interface AuditLogPage {
  data: AuditLogRecord[];
  total: number;
}

/** Append-only: no update, no delete. */
export interface AuditLogRepository {
  insert(entry: NewAuditLog): Promise<string>;
  query(query: AuditLogQuery): Promise<AuditLogPage>;
  findAll(filter: AuditLogFilter, sort: "asc" | "desc"): Promise<AuditLogRecord[]>;
}

export interface Repositories {
  users: UserRepository;
  courses: CourseRepository;
  assignments: AssignmentRepository;
  submissions: SubmissionRepository;
  auditLogs: AuditLogRepository;
}
