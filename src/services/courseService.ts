// src/services/courseService.ts
import type { Clock } from "../lib/clock";
import { hasCapability } from "../lib/capabilities";
import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from "../lib/errors";
import type { CourseRepository, UserRepository } from "../repositories/types";
import type { Actor, CourseRecord, EnrollmentRecord } from "../types/domain";
import type { CourseInput } from "../validators/course";

export class CourseService {
  constructor(
    private readonly courses: CourseRepository,
    private readonly users: UserRepository,
    private readonly clock: Clock
  ) {}

  async create(input: CourseInput, actor: Actor): Promise<CourseRecord> {
    if (!hasCapability(actor.role, "manage_courses")) {
      throw new AuthorizationError("Only lecturers or admins can create courses");
    }

    // Lecturers open their own courses; admins may assign anyone who teaches
    const lecturerId = input.lecturer ?? actor.id;
    if (actor.role !== "admin" && lecturerId !== actor.id) {
      throw new AuthorizationError("Lecturers can only create their own courses");
    }
    const lecturer = await this.users.findById(lecturerId);
    if (!lecturer || lecturer.role === "student") {
      throw new ValidationError({ lecturer: "Lecturer must be an existing lecturer or admin" });
    }

    return this.courses.create({ ...input, lecturer: lecturer.id });
  }

  async get(id: string): Promise<CourseRecord> {
    const course = await this.courses.findById(id);
    if (!course) throw new NotFoundError("Course");
    return course;
  }

  /** Students enrol themselves; admins may enrol any active student. */
  async enroll(courseId: string, studentId: string | undefined, actor: Actor): Promise<EnrollmentRecord> {
    const course = await this.get(courseId);
    const targetId = studentId ?? actor.id;

    if (actor.role !== "admin" && targetId !== actor.id) {
      throw new AuthorizationError("You can only enrol yourself");
    }
    const student = await this.users.findById(targetId);
    if (!student || student.role !== "student") {
      throw new ValidationError({ student: "Only students can be enrolled" });
    }
    if (student.status !== "active") {
      throw new ValidationError({ student: "Student account is suspended" });
    }
    if ((await this.courses.countActiveEnrollments(course.id)) >= course.maxStudents) {
      throw new ConflictError("Course is full");
    }

    return this.courses.enroll(course.id, student.id, this.clock.now());
  }
}
