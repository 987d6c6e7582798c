import type { HydratedDocument } from 'mongoose';
import type { NewUser, User, UserPatch } from '../domain/user';
import { StoreError } from '../errors';
import { UserModel, type UserDocument } from '../models/User';
import { assertObjectId } from './objectId';
import { runQuery } from './mongoSupport';
import type { PageRequest, UserStore } from './types';

const ENTITY = 'User';

const toUser = (doc: HydratedDocument<UserDocument>): User => ({
  id: doc._id.toString(),
  username: doc.username,
  passwordHash: doc.password,
  role: doc.role,
  name: doc.name,
  organization: doc.organization,
  judgeId: doc.judgeId,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt
});

export const toUserSet = (patch: UserPatch, now: Date) => {
  const { passwordHash, ...rest } = patch;
  return {
    ...rest,
    ...(passwordHash === undefined ? {} : { password: passwordHash }),
    updatedAt: now
  };
};

export class MongoUserStore implements UserStore {
  async create(input: NewUser): Promise<User> {
    const now = new Date();
    const { passwordHash, ...rest } = input;
    const doc = await runQuery(ENTITY, () =>
      UserModel.create({ ...rest, password: passwordHash, createdAt: now, updatedAt: now })
    );
    return toUser(doc);
  }

  async getById(id: string): Promise<User> {
    assertObjectId(id, ENTITY);
    const doc = await runQuery(ENTITY, () => UserModel.findById(id).exec());
    if (!doc) {
      throw new StoreError('not_found', ENTITY);
    }
    return toUser(doc);
  }

  async getByUsername(username: string): Promise<User> {
    const doc = await runQuery(ENTITY, () => UserModel.findOne({ username }).exec());
    if (!doc) {
      throw new StoreError('not_found', ENTITY);
    }
    return toUser(doc);
  }

  async list(page: PageRequest): Promise<User[]> {
    const docs = await runQuery(ENTITY, () =>
      UserModel.find().sort({ createdAt: -1, _id: -1 }).skip(page.offset).limit(page.limit).exec()
    );
    return docs.map(toUser);
  }

  async update(id: string, patch: UserPatch): Promise<User> {
    assertObjectId(id, ENTITY);
    const set = toUserSet(patch, new Date());
    const result = await runQuery(ENTITY, () => UserModel.updateOne({ _id: id }, { $set: set }).exec());
    if (result.matchedCount === 0) {
      throw new StoreError('not_found', ENTITY);
    }
    return this.getById(id);
  }

  async delete(id: string): Promise<void> {
    assertObjectId(id, ENTITY);
    const result = await runQuery(ENTITY, () => UserModel.deleteOne({ _id: id }).exec());
    if (result.deletedCount === 0) {
      throw new StoreError('not_found', ENTITY);
    }
  }

  async count(): Promise<number> {
    return runQuery(ENTITY, () => UserModel.countDocuments().exec());
  }
}
