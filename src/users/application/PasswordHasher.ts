// src/users/application/PasswordHasher.ts

import bcrypt from 'bcrypt';

/**
 * Port for one-way password hashing, so services and tests do not depend on
 * the native bcrypt binding directly.
 */
export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export class BcryptPasswordHasher implements PasswordHasher {
  public constructor(private readonly rounds: number) {}

  public async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.rounds);
  }

  public async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
