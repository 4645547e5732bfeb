// src/tests/support/fixtures.ts
import { ManualClock, MS_PER_DAY } from "../../lib/clock";
import { signToken } from "../../lib/jwt";
import { createServices, type Services } from "../../services";
import type { Actor, AssignmentRecord, CourseRecord, UserRecord, UserRole } from "../../types/domain";
import type { NewAssignment } from "../../repositories/types";
import { createMemoryRepositories, type MemoryRepositories } from "./memoryRepositories";

export const DAY = MS_PER_DAY;
export const NOW = new Date("2025-03-10T12:00:00.000Z");

export const at = (offsetMs: number) => new Date(NOW.getTime() + offsetMs);

export interface World {
  repos: MemoryRepositories;
  clock: ManualClock;
  services: Services;
  admin: UserRecord;
  lecturer: UserRecord;
  otherLecturer: UserRecord;
  student: UserRecord;
  otherStudent: UserRecord;
  course: CourseRecord;
  assignment: AssignmentRecord;
}

export const actor = (user: UserRecord): Actor => ({ id: user.id, role: user.role });

export const bearer = (user: UserRecord) => `Bearer ${signToken(user)}`;

let emailCounter = 0;

export const makeUser = (repos: MemoryRepositories, role: UserRole, firstName: string) =>
  repos.users.create({
    email: `${firstName.toLowerCase()}${++emailCounter}@example.test`,
    password: "not-a-real-hash",
    firstName,
    lastName: "Tester",
    role,
  });

export const assignmentFields = (
  course: CourseRecord,
  createdBy: UserRecord,
  overrides: Partial<NewAssignment> = {}
): NewAssignment => ({
  course: course.id,
  title: "Assignment 1",
  description: "First assignment",
  assignmentType: "homework",
  maxPoints: 100,
  passingPoints: 60,
  dueDate: at(7 * DAY),
  availableFrom: null,
  availableUntil: null,
  allowLateSubmission: false,
  latePenaltyPerDay: 0,
  createdBy: createdBy.id,
  ...overrides,
});

export async function seedWorld(
  options: { allowDraftGrading?: boolean; assignment?: Partial<NewAssignment> } = {}
): Promise<World> {
  const repos = createMemoryRepositories();
  const clock = new ManualClock(NOW);
  const services = createServices(repos, clock, {
    allowDraftGrading: options.allowDraftGrading ?? false,
    bcryptRounds: 4,
  });

  const admin = await makeUser(repos, "admin", "Ada");
  const lecturer = await makeUser(repos, "lecturer", "Jane");
  const otherLecturer = await makeUser(repos, "lecturer", "Max");
  const student = await makeUser(repos, "student", "John");
  const otherStudent = await makeUser(repos, "student", "Mia");

  const course = await repos.courses.create({
    code: `CS${++emailCounter}`,
    title: "Intro to CS",
    description: "Test course",
    lecturer: lecturer.id,
    credits: 3,
    maxStudents: 50,
    startDate: at(-30 * DAY),
    endDate: at(60 * DAY),
  });
  await repos.courses.enroll(course.id, student.id, NOW);
  await repos.courses.enroll(course.id, otherStudent.id, NOW);

  const assignment = await repos.assignments.create(
    assignmentFields(course, lecturer, options.assignment),
    NOW
  );

  return { repos, clock, services, admin, lecturer, otherLecturer, student, otherStudent, course, assignment };
}

/** Lets `res.on("finish")` listeners and their inserts run. */
export const flushAudit = () => new Promise<void>((resolve) => setImmediate(resolve));
