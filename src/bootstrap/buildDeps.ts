// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure + application services.
 *
 * - Infrastructure is constructed at the edge.
 * - app.ts depends on ports, not concrete infra.
 * - Tests never come through here, so they never touch MongoDB.
 */

import { config, getJwtSecret } from '../shared/config/Config';
import { connectMongo, disconnectMongo } from '../shared/db/MongoConnection';

import { MongoUserRepository } from '../users/infrastructure/MongoUserRepository';
import { BcryptPasswordHasher } from '../users/application/PasswordHasher';
import { UserService } from '../users/application/UserService';

import { TokenService } from '../auth/application/TokenService';
import { AuthService } from '../auth/application/AuthService';

import type { AppDeps } from '../app';

export type RuntimeDeps = Pick<AppDeps, 'userService' | 'authService' | 'tokenVerifier'> & {
  /**
   * Called during graceful shutdown to release DB connections, flush buffers, etc.
   */
  shutdown: () => Promise<void>;
};

/**
 * Builds runtime dependencies for the service.
 * Fails fast when the token secret, its lifetime or the database URL is misconfigured.
 */
export async function buildRuntimeDeps(): Promise<RuntimeDeps> {
  const tokenService = new TokenService({
    secret: getJwtSecret(),
    expiresIn: config.jwtExpiresIn,
  });

  await connectMongo();

  const userRepository = new MongoUserRepository();
  const passwordHasher = new BcryptPasswordHasher(config.bcryptRounds);

  return {
    userService: new UserService(userRepository, passwordHasher),
    authService: new AuthService(userRepository, passwordHasher, tokenService),
    tokenVerifier: tokenService,
    shutdown: async () => {
      await disconnectMongo();
    },
  };
}
