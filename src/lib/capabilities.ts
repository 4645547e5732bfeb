// src/lib/capabilities.ts
import type { UserRole } from "../types/domain";

export type Capability =
  | "grade"
  | "manage_assignments"
  | "manage_courses"
  | "manage_users"
  | "read_audit_log"
  | "submit_work";

const ROLE_CAPABILITIES: Record<UserRole, readonly Capability[]> = {
  admin: ["grade", "manage_assignments", "manage_courses", "manage_users", "read_audit_log"],
  lecturer: ["grade", "manage_assignments", "manage_courses"],
  student: ["submit_work"],
};

export const hasCapability = (role: UserRole, capability: Capability): boolean =>
  ROLE_CAPABILITIES[role].includes(capability);
