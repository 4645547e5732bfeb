// src/repositories/courseRepository.ts
import mongoose, { type HydratedDocument } from "mongoose";
import Course, { type ICourse } from "../models/Course";
import Enrollment, { type IEnrollment } from "../models/Enrollment";
import { ConflictError, isDuplicateKeyError } from "../lib/errors";
import type { CourseRecord, EnrollmentRecord } from "../types/domain";
import type { CourseRepository, NewCourse } from "./types";

const toCourse = (doc: HydratedDocument<ICourse>): CourseRecord => ({
  id: doc._id.toString(),
  code: doc.code,
  title: doc.title,
  description: doc.description,
  lecturer: doc.lecturer.toString(),
  credits: doc.credits,
  maxStudents: doc.maxStudents,
  startDate: doc.startDate,
  endDate: doc.endDate,
});

const toEnrollment = (doc: HydratedDocument<IEnrollment>): EnrollmentRecord => ({
  id: doc._id.toString(),
  course: doc.course.toString(),
  student: doc.student.toString(),
  status: doc.status,
  enrolledAt: doc.enrolledAt,
});

const validIds = (...ids: string[]) => ids.every((id) => mongoose.Types.ObjectId.isValid(id));

export class MongoCourseRepository implements CourseRepository {
  async create(input: NewCourse) {
    try {
      return toCourse(await Course.create(input));
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ConflictError(`Course code ${input.code} is taken`);
      throw err;
    }
  }

  async findById(id: string) {
    if (!validIds(id)) return null;
    const doc = await Course.findById(id);
    return doc ? toCourse(doc) : null;
  }

  async enroll(courseId: string, studentId: string, at: Date) {
    try {
      const doc = await Enrollment.create({
        course: courseId,
        student: studentId,
        status: "active",
        enrolledAt: at,
      });
      return toEnrollment(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new ConflictError("Student is already enrolled");
      throw err;
    }
  }

  async countActiveEnrollments(courseId: string) {
    if (!validIds(courseId)) return 0;
    return Enrollment.countDocuments({ course: courseId, status: "active" });
  }

  async isEnrolled(courseId: string, studentId: string) {
    if (!validIds(courseId, studentId)) return false;
    const hit = await Enrollment.exists({ course: courseId, student: studentId, status: "active" });
    return hit !== null;
  }

  async isTeaching(courseId: string, userId: string) {
    if (!validIds(courseId, userId)) return false;
    const hit = await Course.exists({ _id: courseId, lecturer: userId });
    return hit !== null;
  }
}
