// src/validators/user.ts
// Two separate update contracts: what a user may change about themselves,
// and what an admin may change about anyone. Fields outside a contract are
// never read, so a student cannot smuggle `role` through the profile route.
import { USER_ROLES, USER_STATUSES, type UserRole, type UserStatus } from "../types/domain";
import { FieldReader } from "./fields";

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const MIN_PASSWORD_LENGTH = 8;

const SELF_REGISTER_ROLES = ["student", "lecturer"] as const satisfies readonly UserRole[];

const readEmail = (f: FieldReader, required: boolean): string | undefined => {
  const email = required ? f.reqString("email", 254) : f.optString("email", 254);
  if (email && !EMAIL_RE.test(email)) {
    f.fail("email", "Enter a valid email address");
  }
  return email?.toLowerCase();
};

const checkPassword = (f: FieldReader, field: string, password: string) => {
  if (!password) return;
  if (password.length < MIN_PASSWORD_LENGTH) {
    f.fail(field, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  } else if (/^\d+$/.test(password)) {
    f.fail(field, "Password cannot be entirely numeric");
  }
};

export interface RegistrationInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  phoneNumber: string;
  bio: string;
}

export const parseRegistration = (raw: unknown): RegistrationInput => {
  const f = new FieldReader(raw);
  const email = readEmail(f, true) ?? "";
  const password = f.reqString("password");
  const passwordConfirm = f.reqString("passwordConfirm");
  checkPassword(f, "password", password);
  if (password && passwordConfirm && password !== passwordConfirm) {
    f.fail("passwordConfirm", "Passwords do not match");
  }
  const input: RegistrationInput = {
    email,
    password,
    firstName: f.reqString("firstName", 150),
    lastName: f.reqString("lastName", 150),
    role: f.optOneOf("role", SELF_REGISTER_ROLES) ?? "student",
    phoneNumber: f.optString("phoneNumber", 20) ?? "",
    bio: f.optString("bio", 2000) ?? "",
  };
  f.assertValid();
  return input;
};

export const parseCredentials = (raw: unknown): { email: string; password: string } => {
  const f = new FieldReader(raw);
  const credentials = {
    email: f.reqString("email").toLowerCase(),
    password: f.reqString("password"),
  };
  f.assertValid();
  return credentials;
};

export interface ProfileChanges {
  firstName?: string;
  lastName?: string;
  phoneNumber?: string;
  bio?: string;
}

export const parseProfileChanges = (raw: unknown): ProfileChanges => {
  const f = new FieldReader(raw);
  const changes: ProfileChanges = {
    firstName: f.optString("firstName", 150),
    lastName: f.optString("lastName", 150),
    phoneNumber: f.optString("phoneNumber", 20),
    bio: f.optString("bio", 2000),
  };
  f.assertValid();
  return changes;
};

export interface AdminUserChanges extends ProfileChanges {
  email?: string;
  role?: UserRole;
  status?: UserStatus;
}

export const parseAdminUserChanges = (raw: unknown): AdminUserChanges => {
  const f = new FieldReader(raw);
  const changes: AdminUserChanges = {
    ...parseProfileChanges(raw),
    email: readEmail(f, false),
    role: f.optOneOf("role", USER_ROLES),
    status: f.optOneOf("status", USER_STATUSES),
  };
  f.assertValid();
  return changes;
};

export interface PasswordChange {
  oldPassword: string;
  newPassword: string;
}

export const parsePasswordChange = (raw: unknown): PasswordChange => {
  const f = new FieldReader(raw);
  const oldPassword = f.reqString("oldPassword");
  const newPassword = f.reqString("newPassword");
  const confirm = f.reqString("newPasswordConfirm");
  checkPassword(f, "newPassword", newPassword);
  if (newPassword && confirm && newPassword !== confirm) {
    f.fail("newPasswordConfirm", "Passwords do not match");
  }
  f.assertValid();
  return { oldPassword, newPassword };
};
