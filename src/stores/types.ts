import type { NewUser, User, UserPatch } from '../domain/user';
import type {
  NewTeamRegistration,
  TeamRegistration,
  TeamRegistrationFilter,
  TeamRegistrationPatch
} from '../domain/teamRegistration';

export interface PageRequest {
  limit: number;
  offset: number;
}

/**
 * Lookups throw `StoreError` with kind `invalid_id` for a malformed id and
 * `not_found` when nothing matches.
 */
export interface UserStore {
  create(input: NewUser): Promise<User>;
  getById(id: string): Promise<User>;
  getByUsername(username: string): Promise<User>;
  list(page: PageRequest): Promise<User[]>;
  update(id: string, patch: UserPatch): Promise<User>;
  delete(id: string): Promise<void>;
  count(): Promise<number>;
}

export interface TeamRegistrationStore {
  /** Assigns `registrationNumber` and `teamId` from one sequence value. */
  create(input: NewTeamRegistration): Promise<TeamRegistration>;
  getById(id: string): Promise<TeamRegistration>;
  getByRegistrationNumber(registrationNumber: string): Promise<TeamRegistration>;
  getByTeamId(teamId: string): Promise<TeamRegistration>;
  getByTeamName(teamName: string): Promise<TeamRegistration>;
  /** Newest submission first. */
  list(filter: TeamRegistrationFilter, page: PageRequest): Promise<TeamRegistration[]>;
  update(id: string, patch: TeamRegistrationPatch): Promise<TeamRegistration>;
  delete(id: string): Promise<void>;
  count(filter?: TeamRegistrationFilter): Promise<number>;
}

export interface Stores {
  users: UserStore;
  teamRegistrations: TeamRegistrationStore;
}

export interface RegistrationNumberFormat {
  numberPrefix: string;
  teamIdPrefix: string;
}
