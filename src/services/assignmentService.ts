// src/services/assignmentService.ts
import type { Clock } from "../lib/clock";
import { hasCapability } from "../lib/capabilities";
import { AuthorizationError, NotFoundError, ValidationError } from "../lib/errors";
import type { AssignmentChanges, AssignmentRepository, CourseRepository } from "../repositories/types";
import type { Actor, AssignmentRecord, CourseRecord } from "../types/domain";
import { describeAssignment, validateAssignmentRules, type AssignmentView } from "../utils/gradingCore";
import type { AssignmentInput } from "../validators/assignment";

const keep = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

export class AssignmentService {
  constructor(
    private readonly assignments: AssignmentRepository,
    private readonly courses: CourseRepository,
    private readonly clock: Clock
  ) {}

  async create(input: AssignmentInput, actor: Actor): Promise<AssignmentView> {
    const course = await this.courses.findById(input.course);
    if (!course) throw new ValidationError({ course: "Course does not exist" });
    await this.assertManager(course, actor);

    const errors = validateAssignmentRules(input);
    if (Object.keys(errors).length > 0) throw new ValidationError(errors);

    const now = this.clock.now();
    const created = await this.assignments.create({ ...input, course: course.id, createdBy: actor.id }, now);
    return describeAssignment(created, now);
  }

  async update(id: string, changes: AssignmentChanges, actor: Actor): Promise<AssignmentView> {
    const existing = await this.load(id);
    const course = await this.courses.findById(existing.course);
    if (!course) throw new NotFoundError("Course");
    await this.assertManager(course, actor);

    // Validate the record as it would look after the change, not the patch alone
    const merged: AssignmentRecord = {
      ...existing,
      title: keep(changes.title, existing.title),
      description: keep(changes.description, existing.description),
      assignmentType: keep(changes.assignmentType, existing.assignmentType),
      maxPoints: keep(changes.maxPoints, existing.maxPoints),
      passingPoints: keep(changes.passingPoints, existing.passingPoints),
      dueDate: keep(changes.dueDate, existing.dueDate),
      availableFrom: keep(changes.availableFrom, existing.availableFrom),
      availableUntil: keep(changes.availableUntil, existing.availableUntil),
      allowLateSubmission: keep(changes.allowLateSubmission, existing.allowLateSubmission),
      latePenaltyPerDay: keep(changes.latePenaltyPerDay, existing.latePenaltyPerDay),
    };
    const errors = validateAssignmentRules(merged);
    if (Object.keys(errors).length > 0) throw new ValidationError(errors);

    const updated = await this.assignments.update(id, changes);
    if (!updated) throw new NotFoundError("Assignment");
    return describeAssignment(updated, this.clock.now());
  }

  async get(id: string): Promise<AssignmentView> {
    return describeAssignment(await this.load(id), this.clock.now());
  }

  async listForCourse(courseId: string): Promise<AssignmentView[]> {
    const now = this.clock.now();
    const rows = await this.assignments.listByCourse(courseId);
    return rows.map((a) => describeAssignment(a, now));
  }

  private async load(id: string): Promise<AssignmentRecord> {
    const assignment = await this.assignments.findById(id);
    if (!assignment) throw new NotFoundError("Assignment");
    return assignment;
  }

  private async assertManager(course: CourseRecord, actor: Actor): Promise<void> {
    if (!hasCapability(actor.role, "manage_assignments")) {
      throw new AuthorizationError("Only lecturers or admins can manage assignments");
    }
    if (actor.role !== "admin" && !(await this.courses.isTeaching(course.id, actor.id))) {
      throw new AuthorizationError("You do not teach this course");
    }
  }
}
