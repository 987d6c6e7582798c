import { z } from 'zod';
import { GENDERS, REGISTRATION_STATUSES, TRACKS } from '../domain/teamRegistration';
import { MAX_REJECTION_REASON_LENGTH } from '../domain/registrationStateMachine';
import { emailSchema, optionalQueryParam, phoneSchema, trimmedText } from './common';

export const TEAM_SIZE_MESSAGE = 'Team must have between 1-4 members (excluding leader)';

const genderSchema = z.enum(GENDERS);
export const trackSchema = z.enum(TRACKS);

const fileRefSchema = z.object({ fileUrl: z.string().trim().url() });

const memberSchema = z.object({
  fullName: trimmedText(100),
  gender: genderSchema,
  mobileNo: phoneSchema,
  email: emailSchema
});

// Forms post four member rows; rows left with a blank name are not members.
const isBlankMemberRow = (row: unknown) =>
  typeof row === 'object' &&
  row !== null &&
  (!('fullName' in row) ||
    row.fullName === undefined ||
    (typeof row.fullName === 'string' && row.fullName.trim() === ''));

const membersSchema = z.preprocess(
  (value) => (Array.isArray(value) ? value.filter((row) => !isBlankMemberRow(row)) : value),
  z.array(memberSchema).min(1, TEAM_SIZE_MESSAGE).max(4, TEAM_SIZE_MESSAGE)
);

const registrationShape = {
  teamName: trimmedText(100),
  leaderName: trimmedText(100),
  leaderEmail: emailSchema,
  leaderMobile: phoneSchema,
  leaderGender: genderSchema,
  institution: trimmedText(200),
  program: trimmedText(100),
  country: trimmedText(100),
  state: trimmedText(100),
  members: membersSchema,
  mentorName: trimmedText(100),
  mentorEmail: emailSchema,
  mentorMobile: phoneSchema,
  mentorInstitution: trimmedText(200),
  mentorDesignation: trimmedText(100),
  instituteNOC: fileRefSchema.optional(),
  idCardsPDF: fileRefSchema.optional(),
  topicName: trimmedText(200),
  topicDescription: trimmedText(5000),
  track: trackSchema,
  presentationPPT: fileRefSchema
};

export const createTeamRegistrationSchema = z.object(registrationShape);

// Status and audit fields are not part of the shape, so `.strict()` turns them into a 400.
export const updateTeamRegistrationSchema = z.object(registrationShape).partial().strict();

export const teamRegistrationQuerySchema = z.object({
  status: optionalQueryParam(z.enum(REGISTRATION_STATUSES)),
  track: optionalQueryParam(trackSchema),
  institution: optionalQueryParam(trimmedText(200))
});

export const registrationActionSchema = z.object({
  action: z.enum(['approve', 'reject']),
  reason: z.string().max(MAX_REJECTION_REASON_LENGTH).optional(),
  actionedBy: z.string().trim().min(1).max(100).optional()
});

export const allocateSchema = z.object({
  judgeId: z.string().trim().min(1)
});

export const evaluateSchema = z.object({
  decision: z.enum(['approve', 'reject']),
  reason: z.string().max(MAX_REJECTION_REASON_LENGTH).optional()
});

export const regNumberParamsSchema = z.object({ regNumber: z.string().trim().min(1) });
export const teamIdParamsSchema = z.object({ teamId: z.string().trim().min(1) });
export const trackParamsSchema = z.object({ track: trackSchema });
