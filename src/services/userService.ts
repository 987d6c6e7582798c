import { toPublicUser, type NewUser, type PublicUser, type UserPatch } from '../domain/user';
import { ApiError, StoreError, notFoundAsNull } from '../errors';
import type { CreateUserInput, UpdateUserInput } from '../schemas/user';
import type { PageRequest, UserStore } from '../stores/types';
import { generateRandomId } from '../utils/randomId';
import type { AuthService } from './authService';

export interface CreatedUser {
  user: PublicUser;
  /** Set only when a judge was created without a password and got their judge id as one. */
  generatedPassword?: string;
}

async function usernameConflict<T>(write: Promise<T>, message: string): Promise<T> {
  try {
    return await write;
  } catch (error) {
    if (error instanceof StoreError && error.kind === 'duplicate' && error.field === 'username') {
      throw new ApiError('conflict', message, { cause: error });
    }
    throw error;
  }
}

export class UserService {
  constructor(
    private readonly users: UserStore,
    private readonly auth: AuthService
  ) {}

  async createUser(input: CreateUserInput): Promise<CreatedUser> {
    if (await this.usernameTaken(input.username)) {
      throw new ApiError('conflict', 'User already exists');
    }

    if (input.role === 'admin') {
      const passwordHash = await this.auth.hashPassword(input.password);
      const user = await usernameConflict(
        this.users.create({ username: input.username, passwordHash, role: 'admin' }),
        'User already exists'
      );
      return { user: toPublicUser(user) };
    }

    const judgeId = `JUDGE-${generateRandomId()}`;
    const password = input.password ?? judgeId;
    const judge: NewUser = {
      username: input.username,
      passwordHash: await this.auth.hashPassword(password),
      role: 'judge',
      name: input.name,
      organization: input.organization,
      judgeId
    };

    const user = await usernameConflict(this.users.create(judge), 'User already exists');
    return {
      user: toPublicUser(user),
      generatedPassword: input.password === undefined ? judgeId : undefined
    };
  }

  async getUser(id: string): Promise<PublicUser> {
    return toPublicUser(await this.users.getById(id));
  }

  async listUsers(page: PageRequest): Promise<{ users: PublicUser[]; total: number }> {
    const [users, total] = await Promise.all([this.users.list(page), this.users.count()]);
    return { users: users.map(toPublicUser), total };
  }

  async updateUser(id: string, input: UpdateUserInput): Promise<PublicUser> {
    const existing = await this.users.getById(id);
    const patch: UserPatch = {};

    if (input.username !== undefined && input.username !== existing.username) {
      if (await this.usernameTaken(input.username)) {
        throw new ApiError('conflict', 'Username already exists');
      }
      patch.username = input.username;
    }

    if (input.password !== undefined) {
      patch.passwordHash = await this.auth.hashPassword(input.password);
    }

    if (Object.keys(patch).length === 0) {
      throw new ApiError('validation', 'No valid fields to update');
    }

    return toPublicUser(await usernameConflict(this.users.update(id, patch), 'Username already exists'));
  }

  async deleteUser(id: string): Promise<void> {
    await this.users.delete(id);
  }

  /**
   * Creates the first admin account when the user collection is empty.
   * Returns the new admin, or null when users already exist.
   */
  async ensureDefaultAdmin(username: string, password: string): Promise<PublicUser | null> {
    if ((await this.users.count()) > 0) {
      return null;
    }

    const admin = await this.users.create({
      username,
      passwordHash: await this.auth.hashPassword(password),
      role: 'admin'
    });
    return toPublicUser(admin);
  }

  private async usernameTaken(username: string): Promise<boolean> {
    return (await notFoundAsNull(this.users.getByUsername(username))) !== null;
  }
}
