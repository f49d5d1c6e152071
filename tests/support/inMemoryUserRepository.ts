/**
 * In-memory IUserRepository used by application and endpoint tests.
 *
 * Honours the repository failure contract (RecordNotFoundError,
 * UniqueConstraintViolation) so services behave as they would against MongoDB.
 */

import type {
  IUserRepository,
  NewUserRecord,
  UserPage,
  UserProfilePatch,
  UserRecord,
} from '../../src/users/domain/User';
import { RecordNotFoundError, UniqueConstraintViolation } from '../../src/shared/errors/DomainErrors';

const EPOCH = Date.UTC(2026, 0, 1);

export class InMemoryUserRepository implements IUserRepository {
  public readonly rows: UserRecord[] = [];
  private sequence = 0;

  public async create(input: NewUserRecord): Promise<UserRecord> {
    this.assertUnique(input.email, input.username);

    this.sequence += 1;
    const at = new Date(EPOCH + this.sequence * 1000).toISOString();
    const row: UserRecord = {
      id: this.sequence.toString(16).padStart(24, '0'),
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      avatarUrl: null,
      bio: null,
      lastLogin: null,
      createdAt: at,
      updatedAt: at,
    };

    this.rows.push(row);
    return { ...row };
  }

  public async findById(id: string): Promise<UserRecord> {
    return { ...this.require(id) };
  }

  public async findByEmail(email: string): Promise<UserRecord | null> {
    const row = this.rows.find((r) => r.email === email.toLowerCase());
    return row ? { ...row } : null;
  }

  public async list(offset: number, limit: number): Promise<UserPage> {
    const newestFirst = [...this.rows].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return {
      items: newestFirst.slice(offset, offset + limit).map((r) => ({ ...r })),
      total: this.rows.length,
    };
  }

  public async updateProfile(id: string, patch: UserProfilePatch): Promise<UserRecord> {
    const row = this.require(id);
    if (patch.username !== undefined && patch.username !== row.username) {
      this.assertUnique(undefined, patch.username);
    }

    Object.assign(row, patch);
    return { ...row };
  }

  public async recordLogin(id: string, at: Date): Promise<void> {
    this.require(id).lastLogin = at.toISOString();
  }

  private require(id: string): UserRecord {
    const row = this.rows.find((r) => r.id === id);
    if (!row) throw new RecordNotFoundError('User', id);
    return row;
  }

  private assertUnique(email: string | undefined, username: string): void {
    const fields: string[] = [];
    if (email !== undefined && this.rows.some((r) => r.email === email)) fields.push('email');
    if (this.rows.some((r) => r.username === username)) fields.push('username');
    if (fields.length > 0) throw new UniqueConstraintViolation('User', fields);
  }
}
