import { Types } from 'mongoose';
import {
  formatSequence,
  type NewTeamRegistration,
  type TeamRegistration,
  type TeamRegistrationFilter,
  type TeamRegistrationPatch
} from '../../src/domain/teamRegistration';
import type { NewUser, User, UserPatch } from '../../src/domain/user';
import { StoreError } from '../../src/errors';
import type { RequestWindowStore } from '../../src/middleware/rateLimiter';
import { assertObjectId } from '../../src/stores/objectId';
import type {
  PageRequest,
  RegistrationNumberFormat,
  Stores,
  TeamRegistrationStore,
  UserStore
} from '../../src/stores/types';

interface Stored<T> {
  seq: number;
  value: T;
}

const page = <T>(items: T[], { offset, limit }: PageRequest) => items.slice(offset, offset + limit);

/** Newest first, later inserts winning ties, the same order the Mongo stores sort by. */
const newestFirst =
  <T>(date: (value: T) => Date) =>
  (a: Stored<T>, b: Stored<T>) =>
    date(b.value).getTime() - date(a.value).getTime() || b.seq - a.seq;

export class MemoryUserStore implements UserStore {
  private readonly rows = new Map<string, Stored<User>>();
  private seq = 0;

  async create(input: NewUser): Promise<User> {
    for (const { value } of this.rows.values()) {
      if (value.username === input.username) {
        throw new StoreError('duplicate', 'User', { field: 'username' });
      }
      if (input.judgeId && value.judgeId === input.judgeId) {
        throw new StoreError('duplicate', 'User', { field: 'judgeId' });
      }
    }

    const now = new Date();
    const user: User = { ...input, id: new Types.ObjectId().toHexString(), createdAt: now, updatedAt: now };
    this.rows.set(user.id, { seq: ++this.seq, value: user });
    return structuredClone(user);
  }

  async getById(id: string): Promise<User> {
    assertObjectId(id, 'User');
    const row = this.rows.get(id);
    if (!row) {
      throw new StoreError('not_found', 'User');
    }
    return structuredClone(row.value);
  }

  async getByUsername(username: string): Promise<User> {
    const row = [...this.rows.values()].find(({ value }) => value.username === username);
    if (!row) {
      throw new StoreError('not_found', 'User');
    }
    return structuredClone(row.value);
  }

  async list(pageRequest: PageRequest): Promise<User[]> {
    const sorted = [...this.rows.values()].sort(newestFirst((user) => user.createdAt));
    return page(sorted, pageRequest).map(({ value }) => structuredClone(value));
  }

  async update(id: string, patch: UserPatch): Promise<User> {
    assertObjectId(id, 'User');
    const row = this.rows.get(id);
    if (!row) {
      throw new StoreError('not_found', 'User');
    }
    if (patch.username !== undefined) {
      const taken = [...this.rows.values()].some(({ value }) => value.id !== id && value.username === patch.username);
      if (taken) {
        throw new StoreError('duplicate', 'User', { field: 'username' });
      }
    }
    row.value = { ...row.value, ...patch, updatedAt: new Date() };
    return structuredClone(row.value);
  }

  async delete(id: string): Promise<void> {
    assertObjectId(id, 'User');
    if (!this.rows.delete(id)) {
      throw new StoreError('not_found', 'User');
    }
  }

  async count(): Promise<number> {
    return this.rows.size;
  }
}

const matches = (registration: TeamRegistration, filter: TeamRegistrationFilter) =>
  (!filter.status || registration.registrationStatus === filter.status) &&
  (!filter.track || registration.track === filter.track) &&
  (!filter.institution || registration.institution.toLowerCase().includes(filter.institution.toLowerCase())) &&
  (!filter.allocatedJudgeId || registration.allocatedJudgeId === filter.allocatedJudgeId);

export class MemoryTeamRegistrationStore implements TeamRegistrationStore {
  private readonly rows = new Map<string, Stored<TeamRegistration>>();
  private seq = 0;
  private sequence = 0;

  constructor(private readonly format: RegistrationNumberFormat = { numberPrefix: 'PCCOEIGC', teamIdPrefix: 'IGC' }) {}

  async create(input: NewTeamRegistration): Promise<TeamRegistration> {
    if ([...this.rows.values()].some(({ value }) => value.teamName === input.teamName)) {
      throw new StoreError('duplicate', 'Team registration', { field: 'teamName' });
    }

    this.sequence += 1;
    const now = new Date();
    const registration: TeamRegistration = {
      ...structuredClone(input),
      id: new Types.ObjectId().toHexString(),
      registrationNumber: formatSequence(this.format.numberPrefix, this.sequence),
      teamId: formatSequence(this.format.teamIdPrefix, this.sequence),
      createdAt: now,
      updatedAt: now
    };
    this.rows.set(registration.id, { seq: ++this.seq, value: registration });
    return structuredClone(registration);
  }

  async getById(id: string): Promise<TeamRegistration> {
    assertObjectId(id, 'Team registration');
    return this.findOne((registration) => registration.id === id);
  }

  async getByRegistrationNumber(registrationNumber: string): Promise<TeamRegistration> {
    return this.findOne((registration) => registration.registrationNumber === registrationNumber);
  }

  async getByTeamId(teamId: string): Promise<TeamRegistration> {
    return this.findOne((registration) => registration.teamId === teamId);
  }

  async getByTeamName(teamName: string): Promise<TeamRegistration> {
    return this.findOne((registration) => registration.teamName === teamName);
  }

  async list(filter: TeamRegistrationFilter, pageRequest: PageRequest): Promise<TeamRegistration[]> {
    const sorted = [...this.rows.values()]
      .filter(({ value }) => matches(value, filter))
      .sort(newestFirst((registration) => registration.submittedAt));
    return page(sorted, pageRequest).map(({ value }) => structuredClone(value));
  }

  async update(id: string, patch: TeamRegistrationPatch): Promise<TeamRegistration> {
    assertObjectId(id, 'Team registration');
    const row = this.rows.get(id);
    if (!row) {
      throw new StoreError('not_found', 'Team registration');
    }
    if (patch.teamName !== undefined) {
      const taken = [...this.rows.values()].some(({ value }) => value.id !== id && value.teamName === patch.teamName);
      if (taken) {
        throw new StoreError('duplicate', 'Team registration', { field: 'teamName' });
      }
    }
    row.value = { ...row.value, ...structuredClone(patch), updatedAt: new Date() };
    return structuredClone(row.value);
  }

  async delete(id: string): Promise<void> {
    assertObjectId(id, 'Team registration');
    if (!this.rows.delete(id)) {
      throw new StoreError('not_found', 'Team registration');
    }
  }

  async count(filter: TeamRegistrationFilter = {}): Promise<number> {
    return [...this.rows.values()].filter(({ value }) => matches(value, filter)).length;
  }

  private async findOne(predicate: (registration: TeamRegistration) => boolean): Promise<TeamRegistration> {
    const row = [...this.rows.values()].find(({ value }) => predicate(value));
    if (!row) {
      throw new StoreError('not_found', 'Team registration');
    }
    return structuredClone(row.value);
  }
}

export const createMemoryStores = (): Stores & {
  users: MemoryUserStore;
  teamRegistrations: MemoryTeamRegistrationStore;
} => ({
  users: new MemoryUserStore(),
  teamRegistrations: new MemoryTeamRegistrationStore()
});

export class MemoryWindowStore implements RequestWindowStore {
  readonly hits = new Map<string, number[]>();
  failWith?: Error;

  async countRecent(key: string, now: number, windowSeconds: number): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }
    const recent = (this.hits.get(key) ?? []).filter((time) => time > now - windowSeconds * 1000);
    this.hits.set(key, recent);
    return recent.length;
  }

  async record(key: string, now: number): Promise<void> {
    this.hits.set(key, [...(this.hits.get(key) ?? []), now]);
  }
}
