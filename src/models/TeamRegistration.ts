import mongoose, { Schema, type Types } from 'mongoose';
import { GENDERS, REGISTRATION_STATUSES, TRACKS, type FileRef, type TeamMember, type TeamRegistration } from '../domain/teamRegistration';

export interface TeamRegistrationDocument extends Omit<TeamRegistration, 'id' | 'allocatedJudgeId'> {
  allocatedJudgeId?: Types.ObjectId;
}

const memberSchema = new Schema<TeamMember>(
  {
    fullName: { type: String, required: true },
    gender: { type: String, enum: [...GENDERS], required: true },
    mobileNo: { type: String, required: true },
    email: { type: String, required: true, lowercase: true }
  },
  { _id: false }
);

const fileSchema = new Schema<FileRef>({ fileUrl: { type: String, required: true } }, { _id: false });

const teamRegistrationSchema = new Schema<TeamRegistrationDocument>({
  teamName: { type: String, required: true, unique: true },
  leaderName: { type: String, required: true },
  leaderEmail: { type: String, required: true, lowercase: true },
  leaderMobile: { type: String, required: true },
  leaderGender: { type: String, enum: [...GENDERS], required: true },
  institution: { type: String, required: true },
  program: { type: String, required: true },
  country: { type: String, required: true },
  state: { type: String, required: true },
  members: { type: [memberSchema], default: [] },
  mentorName: { type: String, required: true },
  mentorEmail: { type: String, required: true, lowercase: true },
  mentorMobile: { type: String, required: true },
  mentorInstitution: { type: String, required: true },
  mentorDesignation: { type: String, required: true },
  instituteNOC: { type: fileSchema },
  idCardsPDF: { type: fileSchema },
  topicName: { type: String, required: true },
  topicDescription: { type: String, required: true },
  track: { type: String, enum: [...TRACKS], required: true },
  presentationPPT: { type: fileSchema, required: true },
  registrationStatus: { type: String, enum: [...REGISTRATION_STATUSES], default: 'pending' },
  registrationNumber: { type: String, required: true, unique: true },
  teamId: { type: String, required: true, unique: true },
  allocatedJudgeId: { type: Schema.Types.ObjectId, ref: 'User' },
  actionedBy: { type: String },
  rejectionReason: { type: String, maxlength: 500 },
  submittedAt: { type: Date, default: Date.now },
  approvedAt: { type: Date },
  rejectedAt: { type: Date },
  createdAt: { type: Date, default: Date.now },
  updatedAt: { type: Date, default: Date.now }
});

teamRegistrationSchema.index({ submittedAt: -1, _id: -1 });
teamRegistrationSchema.index({ registrationStatus: 1 });
teamRegistrationSchema.index({ track: 1 });
teamRegistrationSchema.index({ allocatedJudgeId: 1 });

export const TeamRegistrationModel = mongoose.model<TeamRegistrationDocument>('TeamRegistration', teamRegistrationSchema);
