// src/models/Assignment.ts
import mongoose, { Schema, Document } from "mongoose";
import { ASSIGNMENT_TYPES, type AssignmentType } from "../types/domain";

export interface IAssignment extends Document {
  course: mongoose.Types.ObjectId;
  title: string;
  description: string;
  assignmentType: AssignmentType;
  maxPoints: number;
  passingPoints: number;
  dueDate: Date;
  availableFrom?: Date | null;
  availableUntil?: Date | null;
  allowLateSubmission: boolean;
  latePenaltyPerDay: number;
  createdBy: mongoose.Types.ObjectId;
  createdAt: Date;
}

const AssignmentSchema = new Schema<IAssignment>(
  {
    course: { type: Schema.Types.ObjectId, ref: "Course", required: true, index: true },
    title: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    assignmentType: { type: String, enum: ASSIGNMENT_TYPES, default: "homework" },
    maxPoints: { type: Number, required: true, min: 0 },
    passingPoints: { type: Number, required: true, min: 0 },
    dueDate: { type: Date, required: true },
    availableFrom: { type: Date, default: null },
    availableUntil: { type: Date, default: null },
    allowLateSubmission: { type: Boolean, default: false },
    latePenaltyPerDay: { type: Number, min: 0, max: 100, default: 0 },
    createdBy: { type: Schema.Types.ObjectId, ref: "User", required: true },
  },
  { timestamps: true }
);

// Last line of defence; the service validates the same rule before writing.
AssignmentSchema.pre("validate", function (next) {
  if (this.passingPoints > this.maxPoints) {
    this.invalidate("passingPoints", "Passing points cannot exceed max points");
  }
  next();
});

AssignmentSchema.index({ course: 1, dueDate: 1 });

export default mongoose.model<IAssignment>("Assignment", AssignmentSchema);
