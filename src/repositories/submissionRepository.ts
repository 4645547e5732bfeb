// src/repositories/submissionRepository.ts
import mongoose, { type HydratedDocument } from "mongoose";
import Submission, { type ISubmission } from "../models/Submission";
import { ConflictError, isDuplicateKeyError } from "../lib/errors";
import type { SubmissionRecord } from "../types/domain";
import type { NewSubmission, SubmissionChanges, SubmissionRepository } from "./types";

const toSubmission = (doc: HydratedDocument<ISubmission>): SubmissionRecord => ({
  id: doc._id.toString(),
  assignment: doc.assignment.toString(),
  student: doc.student.toString(),
  content: doc.content,
  status: doc.status,
  pointsEarned: doc.pointsEarned ?? null,
  feedback: doc.feedback,
  gradedBy: doc.gradedBy ? doc.gradedBy.toString() : null,
  createdAt: doc.createdAt,
  submittedAt: doc.submittedAt ?? null,
  gradedAt: doc.gradedAt ?? null,
  version: doc.version,
});

export class MongoSubmissionRepository implements SubmissionRepository {
  async insert(input: NewSubmission) {
    try {
      const doc = await Submission.create({ ...input, version: 0 });
      return toSubmission(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new ConflictError("A submission already exists for this assignment");
      }
      throw err;
    }
  }

  async findById(id: string) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await Submission.findById(id);
    return doc ? toSubmission(doc) : null;
  }

  async findByPair(assignmentId: string, studentId: string) {
    if (!mongoose.Types.ObjectId.isValid(assignmentId) || !mongoose.Types.ObjectId.isValid(studentId)) {
      return null;
    }
    const doc = await Submission.findOne({ assignment: assignmentId, student: studentId });
    return doc ? toSubmission(doc) : null;
  }

  async listByAssignment(assignmentId: string) {
    if (!mongoose.Types.ObjectId.isValid(assignmentId)) return [];
    const docs = await Submission.find({ assignment: assignmentId }).sort({ submittedAt: 1 });
    return docs.map(toSubmission);
  }

  async updateIfVersion(id: string, expectedVersion: number, changes: SubmissionChanges) {
    const doc = await Submission.findOneAndUpdate(
      { _id: id, version: expectedVersion },
      { $set: changes, $inc: { version: 1 } },
      { new: true, runValidators: true }
    );
    return doc ? toSubmission(doc) : null;
  }
}
