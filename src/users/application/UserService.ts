/**
 * UserService
 * -----------
 * Account use cases behind the user routes: register, read, list, update.
 *
 * Failures are raised as domain errors (src/shared/errors); the HTTP layer
 * classifies them.
 */

import { PermissionDenied } from '../../shared/errors/DomainErrors';
import type { CreateUserDto, PaginationQuery, UpdateUserDto } from '../dto/UserDtos';
import { IUserRepository, User, toPublicUser } from '../domain/User';
import type { PasswordHasher } from './PasswordHasher';

export type UserListing = {
  items: User[];
  total: number;
};

export class UserService {
  public constructor(
    private readonly users: IUserRepository,
    private readonly passwords: PasswordHasher,
  ) {}

  public async register(dto: CreateUserDto): Promise<User> {
    const passwordHash = await this.passwords.hash(dto.password);

    const record = await this.users.create({
      username: dto.username,
      email: dto.email,
      passwordHash,
    });

    return toPublicUser(record);
  }

  public async getUser(id: string): Promise<User> {
    return toPublicUser(await this.users.findById(id));
  }

  public async listUsers(query: PaginationQuery): Promise<UserListing> {
    const offset = (query.page - 1) * query.pageSize;
    const result = await this.users.list(offset, query.pageSize);

    return {
      items: result.items.map(toPublicUser),
      total: result.total,
    };
  }

  /**
   * Users may only edit their own profile.
   */
  public async updateProfile(actorId: string, targetId: string, patch: UpdateUserDto): Promise<User> {
    if (actorId !== targetId) {
      throw new PermissionDenied('You may only update your own profile');
    }

    return toPublicUser(await this.users.updateProfile(targetId, patch));
  }
}
