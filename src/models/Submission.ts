// src/models/Submission.ts
import mongoose, { Schema, Document } from "mongoose";
import { SUBMISSION_STATUSES, type SubmissionStatus } from "../types/domain";

export interface ISubmission extends Document {
  assignment: mongoose.Types.ObjectId;
  student: mongoose.Types.ObjectId;
  content: string;
  status: SubmissionStatus;
  pointsEarned: number | null;
  feedback: string;
  gradedBy: mongoose.Types.ObjectId | null;
  submittedAt: Date | null;
  gradedAt: Date | null;
  createdAt: Date;
  version: number;
}

const SubmissionSchema = new Schema<ISubmission>(
  {
    assignment: { type: Schema.Types.ObjectId, ref: "Assignment", required: true },
    student: { type: Schema.Types.ObjectId, ref: "User", required: true },
    content: { type: String, default: "" },
    status: { type: String, enum: SUBMISSION_STATUSES, default: "draft" },
    pointsEarned: { type: Number, min: 0, default: null },
    feedback: { type: String, default: "" },
    gradedBy: { type: Schema.Types.ObjectId, ref: "User", default: null },
    submittedAt: { type: Date, default: null },
    gradedAt: { type: Date, default: null },
    // Bumped on every transition; writes are conditional on it
    version: { type: Number, default: 0 },
  },
  { timestamps: { createdAt: true, updatedAt: true } }
);

// One submission per student per assignment. Two concurrent creates both pass
// the application check; this index decides the winner.
SubmissionSchema.index({ assignment: 1, student: 1 }, { unique: true });
SubmissionSchema.index({ student: 1, status: 1 });

export default mongoose.model<ISubmission>("Submission", SubmissionSchema);
