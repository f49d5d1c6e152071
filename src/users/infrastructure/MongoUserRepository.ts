// src/users/infrastructure/MongoUserRepository.ts

/**
 * MongoUserRepository
 *
 * Infrastructure implementation of IUserRepository using mongoose/MongoDB.
 *
 * - Boundary mapping: document <-> domain record is localized here.
 * - Driver errors are translated to the repository failure contract
 *   (see translateMongoError).
 */

import type { Model } from 'mongoose';

import type {
  IUserRepository,
  NewUserRecord,
  UserPage,
  UserProfilePatch,
  UserRecord,
} from '../../users/domain/User';
import { RecordNotFoundError } from '../../shared/errors/DomainErrors';
import { UserDocument, UserModel, UserRow } from './UserModel';
import { translateMongoError } from './mongoErrors';

const ENTITY = 'User';
const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

function toRecord(row: UserRow): UserRecord {
  return {
    id: row._id.toHexString(),
    username: row.username,
    email: row.email,
    passwordHash: row.passwordHash,
    avatarUrl: row.avatarUrl ?? null,
    bio: row.bio ?? null,
    lastLogin: row.lastLogin ? row.lastLogin.toISOString() : null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export class MongoUserRepository implements IUserRepository {
  public constructor(private readonly model: Model<UserDocument> = UserModel) {}

  public async create(input: NewUserRecord): Promise<UserRecord> {
    return this.run(async () => {
      const created = await this.model.create({
        username: input.username,
        email: input.email,
        passwordHash: input.passwordHash,
        avatarUrl: null,
        bio: null,
        lastLogin: null,
      });
      return toRecord(created);
    });
  }

  public async findById(id: string): Promise<UserRecord> {
    return this.run(async () => {
      this.assertObjectId(id);
      const row = await this.model.findById(id).lean<UserRow>().exec();
      if (!row) throw new RecordNotFoundError(ENTITY, id);
      return toRecord(row);
    });
  }

  public async findByEmail(email: string): Promise<UserRecord | null> {
    return this.run(async () => {
      const row = await this.model.findOne({ email: email.toLowerCase() }).lean<UserRow>().exec();
      return row ? toRecord(row) : null;
    });
  }

  public async list(offset: number, limit: number): Promise<UserPage> {
    return this.run(async () => {
      const [rows, total] = await Promise.all([
        this.model.find({}).sort({ createdAt: -1, _id: -1 }).skip(offset).limit(limit).lean<UserRow[]>().exec(),
        this.model.countDocuments({}).exec(),
      ]);
      return { items: rows.map(toRecord), total };
    });
  }

  public async updateProfile(id: string, patch: UserProfilePatch): Promise<UserRecord> {
    return this.run(async () => {
      this.assertObjectId(id);
      const row = await this.model
        .findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true })
        .lean<UserRow>()
        .exec();
      if (!row) throw new RecordNotFoundError(ENTITY, id);
      return toRecord(row);
    });
  }

  public async recordLogin(id: string, at: Date): Promise<void> {
    return this.run(async () => {
      this.assertObjectId(id);
      const row = await this.model.findByIdAndUpdate(id, { $set: { lastLogin: at } }).lean<UserRow>().exec();
      if (!row) throw new RecordNotFoundError(ENTITY, id);
    });
  }

  /**
   * Ids that cannot be ObjectIds cannot match a document.
   */
  private assertObjectId(id: string): void {
    if (!OBJECT_ID_PATTERN.test(id)) {
      throw new RecordNotFoundError(ENTITY, id);
    }
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      throw translateMongoError(err, ENTITY);
    }
  }
}
