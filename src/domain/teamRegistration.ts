export const GENDERS = ['male', 'female', 'other'] as const;

export const TRACKS = [
  'Climate Forecasting',
  'Smart Agriculture',
  'Disaster Management',
  'Green Transportation',
  'Energy Optimization',
  'Water Conservation',
  'Carbon Tracking',
  'Biodiversity Monitoring',
  'Sustainable Cities',
  'Waste Management',
  'Air Quality',
  'Deforestation Prevention',
  'Climate Education',
  'AI-based Environmental Data Analysis',
  'Public Health Impact of Climate Change',
  'Ocean & Marine Protection using AI'
] as const;

export const REGISTRATION_STATUSES = ['pending', 'approved', 'rejected'] as const;

export type Gender = (typeof GENDERS)[number];
export type Track = (typeof TRACKS)[number];
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

export interface TeamMember {
  fullName: string;
  gender: Gender;
  mobileNo: string;
  email: string;
}

export interface FileRef {
  fileUrl: string;
}

/** Everything a team submits; the only fields an edit may touch. */
export interface TeamRegistrationDetails {
  teamName: string;
  leaderName: string;
  leaderEmail: string;
  leaderMobile: string;
  leaderGender: Gender;
  institution: string;
  program: string;
  country: string;
  state: string;
  members: TeamMember[];
  mentorName: string;
  mentorEmail: string;
  mentorMobile: string;
  mentorInstitution: string;
  mentorDesignation: string;
  instituteNOC?: FileRef;
  idCardsPDF?: FileRef;
  topicName: string;
  topicDescription: string;
  track: Track;
  presentationPPT: FileRef;
}

export interface TeamRegistration extends TeamRegistrationDetails {
  id: string;
  registrationNumber: string;
  teamId: string;
  registrationStatus: RegistrationStatus;
  allocatedJudgeId?: string;
  actionedBy?: string;
  rejectionReason?: string;
  submittedAt: Date;
  approvedAt?: Date;
  rejectedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTeamRegistration = TeamRegistrationDetails & {
  registrationStatus: RegistrationStatus;
  submittedAt: Date;
};

export type TeamRegistrationPatch = Partial<
  Omit<TeamRegistration, 'id' | 'registrationNumber' | 'teamId' | 'submittedAt' | 'createdAt' | 'updatedAt'>
>;

export interface TeamRegistrationFilter {
  status?: RegistrationStatus;
  track?: Track;
  institution?: string;
  allocatedJudgeId?: string;
}

export const isApproved = (registration: TeamRegistration) => registration.registrationStatus === 'approved';
export const isRejected = (registration: TeamRegistration) => registration.registrationStatus === 'rejected';

/** `formatSequence('IGC', 7)` gives `IGC007`; values past 999 keep all their digits. */
export const formatSequence = (prefix: string, value: number) => `${prefix}${String(value).padStart(3, '0')}`;

/** Inverse of `formatSequence`; undefined when `value` was not formatted with `prefix`. */
export function parseSequence(prefix: string, value: string): number | undefined {
  if (!value.startsWith(prefix)) {
    return undefined;
  }
  const digits = value.slice(prefix.length);
  return /^\d+$/.test(digits) ? Number(digits) : undefined;
}
