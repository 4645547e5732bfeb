// src/types/domain.ts
// Plain records handed between repositories, services and routes.
// Ids are opaque strings (ObjectId hex when backed by MongoDB).

export const USER_ROLES = ["admin", "lecturer", "student"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const USER_STATUSES = ["active", "suspended"] as const;
export type UserStatus = (typeof USER_STATUSES)[number];

export interface UserRecord {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  status: UserStatus;
  phoneNumber: string;
  bio: string;
  tokenVersion: number;
  createdAt: Date;
}

export interface UserWithPassword extends UserRecord {
  password: string;
}

/** The authenticated identity attempting an operation. */
export interface Actor {
  id: string;
  role: UserRole;
}

export interface CourseRecord {
  id: string;
  code: string;
  title: string;
  description: string;
  lecturer: string;
  credits: number;
  maxStudents: number;
  startDate: Date;
  endDate: Date;
}

export const ENROLLMENT_STATUSES = ["active", "dropped", "completed"] as const;
export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];

export interface EnrollmentRecord {
  id: string;
  course: string;
  student: string;
  status: EnrollmentStatus;
  enrolledAt: Date;
}

export const ASSIGNMENT_TYPES = ["homework", "quiz", "project", "exam"] as const;
export type AssignmentType = (typeof ASSIGNMENT_TYPES)[number];

export interface AssignmentRecord {
  id: string;
  course: string;
  title: string;
  description: string;
  assignmentType: AssignmentType;
  maxPoints: number;
  passingPoints: number;
  dueDate: Date;
  availableFrom: Date | null;
  availableUntil: Date | null;
  allowLateSubmission: boolean;
  latePenaltyPerDay: number; // percent of maxPoints per whole day late
  createdBy: string;
  createdAt: Date;
}

export const SUBMISSION_STATUSES = ["draft", "submitted", "graded", "returned"] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export interface SubmissionRecord {
  id: string;
  assignment: string;
  student: string;
  content: string;
  status: SubmissionStatus;
  pointsEarned: number | null;
  feedback: string;
  gradedBy: string | null;
  createdAt: Date;
  submittedAt: Date | null;
  gradedAt: Date | null;
  version: number;
}

export const AUDIT_ACTIONS = [
  "create",
  "read",
  "update",
  "delete",
  "login",
  "logout",
  "access_denied",
  "grade_submitted",
  "enrollment",
  "submission",
] as const;
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

/** Type-erased pointer at any registered entity. */
export interface EntityRef {
  type: string;
  id: string;
}

export interface RequestMetadata {
  ipAddress: string | null;
  userAgent: string;
  method: string;
  path: string;
}

export interface AuditLogRecord {
  id: string;
  user: string | null;
  action: AuditAction;
  description: string;
  targetType: string | null;
  targetId: string | null;
  ipAddress: string | null;
  userAgent: string;
  requestMethod: string;
  requestPath: string;
  extraData: Record<string, unknown>;
  success: boolean;
  errorMessage: string;
  timestamp: Date;
}

export type NewAuditLog = Omit<AuditLogRecord, "id">;

export const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T =>
  typeof value === "string" && values.some((v) => v === value);
