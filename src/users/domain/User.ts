/**
 * User account domain models and the repository port.
 *
 * Timestamps are ISO-8601 strings at this layer; the repository converts
 * from whatever the store keeps.
 */

/**
 * A user as exposed to callers. Never carries credentials.
 */
export interface User {
  id: string;
  username: string;
  email: string;
  avatarUrl: string | null;
  bio: string | null;
  lastLogin: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * A stored user, including the password hash. Stays below the HTTP layer.
 */
export interface UserRecord extends User {
  passwordHash: string;
}

export type NewUserRecord = {
  username: string;
  email: string;
  passwordHash: string;
};

export type UserProfilePatch = {
  username?: string;
  bio?: string;
  avatarUrl?: string;
};

export type UserPage = {
  items: UserRecord[];
  total: number;
};

/**
 * Persistence port for user accounts.
 *
 * Failure contract:
 * - findById / updateProfile / recordLogin throw RecordNotFoundError for unknown ids
 * - create / updateProfile throw UniqueConstraintViolation for a taken email or username
 * - store outages surface as PersistenceUnavailableError
 */
export interface IUserRepository {
  create(input: NewUserRecord): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord>;
  findByEmail(email: string): Promise<UserRecord | null>;

  /**
   * Newest first.
   */
  list(offset: number, limit: number): Promise<UserPage>;

  updateProfile(id: string, patch: UserProfilePatch): Promise<UserRecord>;
  recordLogin(id: string, at: Date): Promise<void>;
}

export function toPublicUser(record: UserRecord): User {
  return {
    id: record.id,
    username: record.username,
    email: record.email,
    avatarUrl: record.avatarUrl,
    bio: record.bio,
    lastLogin: record.lastLogin,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  };
}
