// src/users/infrastructure/UserModel.ts

/**
 * Mongoose model for the users collection.
 *
 * Unique indexes on email and username back the UniqueConstraintViolation
 * contract of IUserRepository.
 */

import { Model, Schema, Types, model } from 'mongoose';

export interface UserDocument {
  username: string;
  email: string;
  passwordHash: string;
  avatarUrl: string | null;
  bio: string | null;
  lastLogin: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Shape of a lean (plain object) read.
 */
export type UserRow = UserDocument & { _id: Types.ObjectId };

const userSchema = new Schema<UserDocument>(
  {
    username: { type: String, required: true, unique: true, trim: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    passwordHash: { type: String, required: true },
    avatarUrl: { type: String, default: null },
    bio: { type: String, default: null },
    lastLogin: { type: Date, default: null },
  },
  { collection: 'users', timestamps: true },
);

userSchema.index({ createdAt: -1 });

export const UserModel: Model<UserDocument> = model<UserDocument>('User', userSchema);
