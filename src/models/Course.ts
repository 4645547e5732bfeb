// src/models/Course.ts
import mongoose, { Schema, Document } from "mongoose";

export interface ICourse extends Document {
  code: string;
  title: string;
  description: string;
  lecturer: mongoose.Types.ObjectId;
  credits: number;
  maxStudents: number;
  startDate: Date;
  endDate: Date;
}

const CourseSchema = new Schema<ICourse>(
  {
    code: { type: String, required: true, unique: true, uppercase: true, trim: true },
    title: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    lecturer: { type: Schema.Types.ObjectId, ref: "User", required: true },
    credits: { type: Number, min: 0, default: 0 },
    maxStudents: { type: Number, min: 1, default: 50 },
    startDate: { type: Date, required: true },
    endDate: { type: Date, required: true },
  },
  { timestamps: true }
);

export default mongoose.model<ICourse>("Course", CourseSchema);
