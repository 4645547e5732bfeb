// src/models/Enrollment.ts
import mongoose, { Schema, Document } from "mongoose";
import { ENROLLMENT_STATUSES, type EnrollmentStatus } from "../types/domain";

export interface IEnrollment extends Document {
  course: mongoose.Types.ObjectId;
  student: mongoose.Types.ObjectId;
  status: EnrollmentStatus;
  enrolledAt: Date;
}

const EnrollmentSchema = new Schema<IEnrollment>({
  course: { type: Schema.Types.ObjectId, ref: "Course", required: true },
  student: { type: Schema.Types.ObjectId, ref: "User", required: true },
  status: { type: String, enum: ENROLLMENT_STATUSES, default: "active" },
  enrolledAt: { type: Date, default: Date.now },
});

EnrollmentSchema.index({ course: 1, student: 1 }, { unique: true });

export default mongoose.model<IEnrollment>("Enrollment", EnrollmentSchema);
