// src/repositories/assignmentRepository.ts
import mongoose, { type HydratedDocument } from "mongoose";
import Assignment, { type IAssignment } from "../models/Assignment";
import type { AssignmentRecord } from "../types/domain";
import type { AssignmentChanges, AssignmentRepository, NewAssignment } from "./types";

const toAssignment = (doc: HydratedDocument<IAssignment>): AssignmentRecord => ({
  id: doc._id.toString(),
  course: doc.course.toString(),
  title: doc.title,
  description: doc.description,
  assignmentType: doc.assignmentType,
  maxPoints: doc.maxPoints,
  passingPoints: doc.passingPoints,
  dueDate: doc.dueDate,
  availableFrom: doc.availableFrom ?? null,
  availableUntil: doc.availableUntil ?? null,
  allowLateSubmission: doc.allowLateSubmission,
  latePenaltyPerDay: doc.latePenaltyPerDay,
  createdBy: doc.createdBy.toString(),
  createdAt: doc.createdAt,
});

export class MongoAssignmentRepository implements AssignmentRepository {
  async create(input: NewAssignment, at: Date) {
    const doc = await Assignment.create({ ...input, createdAt: at });
    return toAssignment(doc);
  }

  async findById(id: string) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await Assignment.findById(id);
    return doc ? toAssignment(doc) : null;
  }

  async update(id: string, changes: AssignmentChanges) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await Assignment.findByIdAndUpdate(id, { $set: changes }, { new: true });
    return doc ? toAssignment(doc) : null;
  }

  async listByCourse(courseId: string) {
    if (!mongoose.Types.ObjectId.isValid(courseId)) return [];
    const docs = await Assignment.find({ course: courseId }).sort({ dueDate: 1 });
    return docs.map(toAssignment);
  }
}
