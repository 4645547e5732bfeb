// src/tests/validators.test.ts
import { hasCapability } from "../lib/capabilities";
import { ValidationError } from "../lib/errors";
import { parseAssignmentChanges } from "../validators/assignment";
import { parseGradeInput } from "../validators/submission";
import { parseAdminUserChanges, parseProfileChanges, parseRegistration } from "../validators/user";

const fieldErrors = (fn: () => unknown) => {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.details;
    throw err;
  }
  throw new Error("expected a ValidationError");
};

describe("user contracts", () => {
  const base = {
    email: "a@example.test",
    password: "s3cure-pass",
    passwordConfirm: "s3cure-pass",
    firstName: "A",
    lastName: "B",
  };

  it("rejects all-digit and short passwords", () => {
    expect(fieldErrors(() => parseRegistration({ ...base, password: "12345678", passwordConfirm: "12345678" }))).toEqual({
      password: "Password cannot be entirely numeric",
    });
    expect(fieldErrors(() => parseRegistration({ ...base, password: "short", passwordConfirm: "short" }))).toEqual({
      password: "Password must be at least 8 characters",
    });
  });

  it("defaults the role to student", () => {
    expect(parseRegistration(base).role).toBe("student");
  });

  it("drops fields outside the profile contract", () => {
    expect(parseProfileChanges({ bio: "Hi", role: "admin", status: "suspended" })).toEqual({
      firstName: undefined,
      lastName: undefined,
      phoneNumber: undefined,
      bio: "Hi",
    });
  });

  it("lets the admin contract carry role and status", () => {
    expect(parseAdminUserChanges({ role: "lecturer", status: "suspended" })).toMatchObject({
      role: "lecturer",
      status: "suspended",
    });
    expect(fieldErrors(() => parseAdminUserChanges({ email: "not-an-email" }))).toEqual({
      email: "Enter a valid email address",
    });
  });
});

describe("grading inputs", () => {
  it("accepts numeric strings and extra credit", () => {
    expect(parseGradeInput({ pointsEarned: "120" })).toEqual({ pointsEarned: 120, feedback: "" });
  });

  it("requires points", () => {
    expect(fieldErrors(() => parseGradeInput({ feedback: "Nice" }))).toEqual({
      pointsEarned: "This field is required",
    });
  });

  it("treats null as clearing an optional date", () => {
    expect(parseAssignmentChanges({ availableFrom: null })).toMatchObject({ availableFrom: null });
    expect(parseAssignmentChanges({}).availableFrom).toBeUndefined();
  });
});

describe("capabilities", () => {
  it.each([
    ["admin", "read_audit_log", true],
    ["admin", "submit_work", false],
    ["lecturer", "grade", true],
    ["lecturer", "manage_users", false],
    ["student", "submit_work", true],
    ["student", "grade", false],
  ] as const)("%s / %s → %s", (role, capability, expected) => {
    expect(hasCapability(role, capability)).toBe(expected);
  });
});
