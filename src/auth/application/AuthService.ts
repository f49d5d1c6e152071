/**
 * AuthService
 * -----------
 * Exchanges email + password for a bearer token.
 *
 * Unknown email and wrong password fail identically so the response does not
 * reveal which accounts exist.
 */

import { AuthenticationFailure } from '../../shared/errors/DomainErrors';
import type { IUserRepository } from '../../users/domain/User';
import type { PasswordHasher } from '../../users/application/PasswordHasher';
import type { LoginDto } from '../dto/LoginDto';
import type { TokenService } from './TokenService';

export type AccessToken = {
  accessToken: string;
  tokenType: 'Bearer';
  /** ISO-8601 */
  expiresAt: string;
};

/**
 * Hashed once per service; an unknown email is checked against this hash.
 */
const TIMING_PLACEHOLDER_PASSWORD = 'unknown-account-placeholder';

export type AuthServiceOptions = {
  now?: () => Date;
};

export class AuthService {
  private readonly now: () => Date;
  private placeholderHash: Promise<string> | null = null;

  public constructor(
    private readonly users: Pick<IUserRepository, 'findByEmail' | 'recordLogin'>,
    private readonly passwords: PasswordHasher,
    private readonly tokens: Pick<TokenService, 'issue'>,
    options: AuthServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  public async login(dto: LoginDto): Promise<AccessToken> {
    const user = await this.users.findByEmail(dto.email);
    const hash = user ? user.passwordHash : await this.unknownAccountHash();
    const valid = await this.passwords.verify(dto.password, hash);

    if (!user || !valid) {
      throw new AuthenticationFailure('credentials', 'Invalid email or password');
    }

    await this.users.recordLogin(user.id, this.now());

    const issued = this.tokens.issue(user.id, { username: user.username });

    return {
      accessToken: issued.token,
      tokenType: 'Bearer',
      expiresAt: new Date(issued.expiresAt * 1000).toISOString(),
    };
  }

  private unknownAccountHash(): Promise<string> {
    if (this.placeholderHash === null) {
      this.placeholderHash = this.passwords.hash(TIMING_PLACEHOLDER_PASSWORD).catch((err: unknown) => {
        this.placeholderHash = null;
        throw err;
      });
    }
    return this.placeholderHash;
  }
}
