import mongoose, { Schema } from 'mongoose';
import { USER_ROLES, type UserRole } from '../domain/user';

export interface UserDocument {
  username: string;
  password: string;
  role: UserRole;
  name?: string;
  organization?: string;
  judgeId?: string;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<UserDocument>({
  username: { type: String, required: true, unique: true, trim: true },
  // bcrypt hash, never the plain password
  password: { type: String, required: true },
  role: { type: String, enum: [...USER_ROLES], default: 'user' },
  name: { type: String },
  organization: { type: String },
  judgeId: { type: String, unique: true, sparse: true },
  createdAt: { type: Date, default: Date.now },
  updatedAt: { type: Date, default: Date.now }
});

userSchema.index({ createdAt: -1 });

export const UserModel = mongoose.model<UserDocument>('User', userSchema);
