import { Types, type FilterQuery, type HydratedDocument } from 'mongoose';
import {
  formatSequence,
  parseSequence,
  type NewTeamRegistration,
  type TeamRegistration,
  type TeamRegistrationFilter,
  type TeamRegistrationPatch
} from '../domain/teamRegistration';
import { StoreError } from '../errors';
import { CounterModel } from '../models/Counter';
import { TeamRegistrationModel, type TeamRegistrationDocument } from '../models/TeamRegistration';
import { assertObjectId } from './objectId';
import { escapeRegex, runQuery } from './mongoSupport';
import type { PageRequest, RegistrationNumberFormat, TeamRegistrationStore } from './types';

const ENTITY = 'Team registration';
const SEQUENCE_ID = 'teamRegistration';

const toTeamRegistration = (doc: HydratedDocument<TeamRegistrationDocument>): TeamRegistration => ({
  id: doc._id.toString(),
  teamName: doc.teamName,
  leaderName: doc.leaderName,
  leaderEmail: doc.leaderEmail,
  leaderMobile: doc.leaderMobile,
  leaderGender: doc.leaderGender,
  institution: doc.institution,
  program: doc.program,
  country: doc.country,
  state: doc.state,
  members: doc.members.map((member) => ({
    fullName: member.fullName,
    gender: member.gender,
    mobileNo: member.mobileNo,
    email: member.email
  })),
  mentorName: doc.mentorName,
  mentorEmail: doc.mentorEmail,
  mentorMobile: doc.mentorMobile,
  mentorInstitution: doc.mentorInstitution,
  mentorDesignation: doc.mentorDesignation,
  instituteNOC: doc.instituteNOC ? { fileUrl: doc.instituteNOC.fileUrl } : undefined,
  idCardsPDF: doc.idCardsPDF ? { fileUrl: doc.idCardsPDF.fileUrl } : undefined,
  topicName: doc.topicName,
  topicDescription: doc.topicDescription,
  track: doc.track,
  presentationPPT: { fileUrl: doc.presentationPPT.fileUrl },
  registrationStatus: doc.registrationStatus,
  registrationNumber: doc.registrationNumber,
  teamId: doc.teamId,
  allocatedJudgeId: doc.allocatedJudgeId?.toString(),
  actionedBy: doc.actionedBy,
  rejectionReason: doc.rejectionReason,
  submittedAt: doc.submittedAt,
  approvedAt: doc.approvedAt,
  rejectedAt: doc.rejectedAt,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt
});

export function toQuery(filter: TeamRegistrationFilter): FilterQuery<TeamRegistrationDocument> {
  const query: FilterQuery<TeamRegistrationDocument> = {};

  if (filter.status) {
    query.registrationStatus = filter.status;
  }
  if (filter.track) {
    query.track = filter.track;
  }
  if (filter.institution) {
    query.institution = { $regex: escapeRegex(filter.institution), $options: 'i' };
  }
  if (filter.allocatedJudgeId) {
    assertObjectId(filter.allocatedJudgeId, 'User');
    query.allocatedJudgeId = new Types.ObjectId(filter.allocatedJudgeId);
  }

  return query;
}

export const toRegistrationSet = (patch: TeamRegistrationPatch, now: Date) => {
  const { allocatedJudgeId, ...rest } = patch;
  return {
    ...rest,
    ...(allocatedJudgeId === undefined ? {} : { allocatedJudgeId: new Types.ObjectId(allocatedJudgeId) }),
    updatedAt: now
  };
};

type IssuedNumbers = Pick<TeamRegistration, 'registrationNumber' | 'teamId'>;

/** The largest sequence value behind any stored registration number or team id. */
export function highestIssuedSequence(rows: IssuedNumbers[], format: RegistrationNumberFormat): number {
  return rows.reduce(
    (highest, row) =>
      Math.max(
        highest,
        parseSequence(format.numberPrefix, row.registrationNumber) ?? 0,
        parseSequence(format.teamIdPrefix, row.teamId) ?? 0
      ),
    0
  );
}

const SEQUENCE_FIELDS = ['registrationNumber', 'teamId'];
const MAX_CREATE_ATTEMPTS = 3;

/** A create lost to an already issued registration number or team id. */
export const isSequenceCollision = (error: unknown) =>
  error instanceof StoreError &&
  error.kind === 'duplicate' &&
  error.field !== undefined &&
  SEQUENCE_FIELDS.includes(error.field);

export class MongoTeamRegistrationStore implements TeamRegistrationStore {
  constructor(private readonly format: RegistrationNumberFormat) {}

  /**
   * Raises the sequence to the highest number already issued. Older data may
   * have gaps left by deletes, so the document count alone is not enough.
   */
  async syncSequence(): Promise<void> {
    await runQuery(ENTITY, async () => {
      const rows = await TeamRegistrationModel.find({}, { registrationNumber: 1, teamId: 1 }).lean().exec();
      const highest = Math.max(rows.length, highestIssuedSequence(rows, this.format));
      await CounterModel.updateOne({ _id: SEQUENCE_ID }, { $max: { seq: highest } }, { upsert: true }).exec();
    });
  }

  async create(input: NewTeamRegistration): Promise<TeamRegistration> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.insert(input);
      } catch (error) {
        if (attempt >= MAX_CREATE_ATTEMPTS || !isSequenceCollision(error)) {
          throw error;
        }
        await this.syncSequence();
      }
    }
  }

  private async insert(input: NewTeamRegistration): Promise<TeamRegistration> {
    const doc = await runQuery(ENTITY, async () => {
      const seq = await this.nextSequence();
      const now = new Date();
      return TeamRegistrationModel.create({
        ...input,
        registrationNumber: formatSequence(this.format.numberPrefix, seq),
        teamId: formatSequence(this.format.teamIdPrefix, seq),
        createdAt: now,
        updatedAt: now
      });
    });
    return toTeamRegistration(doc);
  }

  async getById(id: string): Promise<TeamRegistration> {
    assertObjectId(id, ENTITY);
    return this.findOne({ _id: id });
  }

  async getByRegistrationNumber(registrationNumber: string): Promise<TeamRegistration> {
    return this.findOne({ registrationNumber });
  }

  async getByTeamId(teamId: string): Promise<TeamRegistration> {
    return this.findOne({ teamId });
  }

  async getByTeamName(teamName: string): Promise<TeamRegistration> {
    return this.findOne({ teamName });
  }

  async list(filter: TeamRegistrationFilter, page: PageRequest): Promise<TeamRegistration[]> {
    const query = toQuery(filter);
    const docs = await runQuery(ENTITY, () =>
      TeamRegistrationModel.find(query).sort({ submittedAt: -1, _id: -1 }).skip(page.offset).limit(page.limit).exec()
    );
    return docs.map(toTeamRegistration);
  }

  async update(id: string, patch: TeamRegistrationPatch): Promise<TeamRegistration> {
    assertObjectId(id, ENTITY);
    const set = toRegistrationSet(patch, new Date());
    const result = await runQuery(ENTITY, () =>
      TeamRegistrationModel.updateOne({ _id: id }, { $set: set }).exec()
    );
    if (result.matchedCount === 0) {
      throw new StoreError('not_found', ENTITY);
    }
    return this.getById(id);
  }

  async delete(id: string): Promise<void> {
    assertObjectId(id, ENTITY);
    const result = await runQuery(ENTITY, () => TeamRegistrationModel.deleteOne({ _id: id }).exec());
    if (result.deletedCount === 0) {
      throw new StoreError('not_found', ENTITY);
    }
  }

  async count(filter: TeamRegistrationFilter = {}): Promise<number> {
    const query = toQuery(filter);
    return runQuery(ENTITY, () => TeamRegistrationModel.countDocuments(query).exec());
  }

  private async findOne(query: FilterQuery<TeamRegistrationDocument>): Promise<TeamRegistration> {
    const doc = await runQuery(ENTITY, () => TeamRegistrationModel.findOne(query).exec());
    if (!doc) {
      throw new StoreError('not_found', ENTITY);
    }
    return toTeamRegistration(doc);
  }

  private async nextSequence(): Promise<number> {
    const counter = await CounterModel.findOneAndUpdate(
      { _id: SEQUENCE_ID },
      { $inc: { seq: 1 } },
      { upsert: true, new: true }
    ).exec();
    if (!counter) {
      throw new StoreError('failure', ENTITY);
    }
    return counter.seq;
  }
}
