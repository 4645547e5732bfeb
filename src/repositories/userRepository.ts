// src/repositories/userRepository.ts
import mongoose, { type HydratedDocument } from "mongoose";
import User, { type IUser } from "../models/User";
import { ConflictError, isDuplicateKeyError } from "../lib/errors";
import type { UserRecord, UserWithPassword } from "../types/domain";
import type { NewUser, UserChanges, UserRepository } from "./types";

const toUser = (doc: HydratedDocument<IUser>): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  firstName: doc.firstName,
  lastName: doc.lastName,
  role: doc.role,
  status: doc.status,
  phoneNumber: doc.phoneNumber,
  bio: doc.bio,
  tokenVersion: doc.tokenVersion,
  createdAt: doc.createdAt,
});

const withPassword = (doc: HydratedDocument<IUser>): UserWithPassword => ({
  ...toUser(doc),
  password: doc.password,
});

const emailTaken = () => new ConflictError("A user with this email already exists");

export class MongoUserRepository implements UserRepository {
  async findById(id: string) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await User.findById(id);
    return doc ? toUser(doc) : null;
  }

  async findByIdWithPassword(id: string) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    const doc = await User.findById(id).select("+password");
    return doc ? withPassword(doc) : null;
  }

  async findByEmailWithPassword(email: string) {
    const doc = await User.findOne({ email: email.toLowerCase().trim() }).select("+password");
    return doc ? withPassword(doc) : null;
  }

  async create(input: NewUser) {
    try {
      const doc = await User.create(input);
      return toUser(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) throw emailTaken();
      throw err;
    }
  }

  async update(id: string, changes: UserChanges) {
    if (!mongoose.Types.ObjectId.isValid(id)) return null;
    try {
      const doc = await User.findByIdAndUpdate(
        id,
        { $set: changes },
        { new: true, runValidators: true }
      );
      return doc ? toUser(doc) : null;
    } catch (err) {
      if (isDuplicateKeyError(err)) throw emailTaken();
      throw err;
    }
  }

  async setPassword(id: string, passwordHash: string) {
    await User.updateOne({ _id: id }, { $set: { password: passwordHash }, $inc: { tokenVersion: 1 } });
  }

  async list() {
    const docs = await User.find().sort({ lastName: 1, firstName: 1 });
    return docs.map(toUser);
  }
}
