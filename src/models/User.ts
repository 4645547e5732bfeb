// src/models/User.ts
import mongoose, { Schema, Document, Model, Types } from "mongoose";
import { USER_ROLES, USER_STATUSES, type UserRole, type UserStatus } from "../types/domain";

export interface IUser extends Document {
  _id: Types.ObjectId;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  status: UserStatus;
  phoneNumber: string;
  bio: string;
  tokenVersion: number;
  createdAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    password: { type: String, required: true, select: false },
    firstName: { type: String, required: true, trim: true },
    lastName: { type: String, required: true, trim: true },
    role: { type: String, enum: USER_ROLES, default: "student", required: true },
    status: { type: String, enum: USER_STATUSES, default: "active" },
    phoneNumber: { type: String, default: "" },
    bio: { type: String, default: "" },
    tokenVersion: { type: Number, default: 0, required: true },
  },
  { timestamps: true }
);

userSchema.index({ lastName: 1, firstName: 1 });

const User: Model<IUser> = mongoose.model<IUser>("User", userSchema);

export default User;
