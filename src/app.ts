/**
 * Express application setup for the userhub service.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers the request pipeline middleware in its fixed order
 *   (correlation id -> access log); bodies are read per route.
 * - Mounts the route groups and the 404 / error fallbacks, which answer with
 *   the same envelope as the routes.
 */
import express, { Application } from 'express';

import { config } from './shared/config/Config';
import { logger as defaultLogger, type AppLogger } from './shared/logging/Logger';
import { AuthenticationFailure } from './shared/errors/DomainErrors';

import { createCorrelationIdMiddleware } from './http/middleware/correlationId';
import { createAccessLogMiddleware } from './http/middleware/accessLog';
import { createErrorHandler } from './http/middleware/errorHandler';
import { createNotFoundHandler } from './http/middleware/notFound';
import { TokenAuthenticator, type TokenVerifierPort } from './http/auth/tokenAuthenticator';
import type { RoutePipelineDeps } from './http/pipeline/routePipeline';

import { createSystemRoutes } from './http/routes/systemRoutes';
import { createAuthRoutes, type AuthServicePort } from './http/routes/authRoutes';
import { createUserRoutes, type UserServicePort } from './http/routes/userRoutes';

export type AppDeps = {
  userService: UserServicePort;
  authService: AuthServicePort;
  tokenVerifier: TokenVerifierPort;
  logger: AppLogger;
  bodyLimit: string;
};

const JSON_CONTENT_TYPES = ['application/json', 'application/*+json'];

function notConfigured(name: string): Error {
  return new Error(`${name} is not configured for this app instance`);
}

/**
 * Stand-ins for dependencies a caller did not provide (tests that only
 * exercise part of the app). Every call fails as an internal error.
 */
const unconfiguredUsers: UserServicePort = {
  register: async () => {
    throw notConfigured('userService');
  },
  getUser: async () => {
    throw notConfigured('userService');
  },
  listUsers: async () => {
    throw notConfigured('userService');
  },
  updateProfile: async () => {
    throw notConfigured('userService');
  },
};

const unconfiguredAuth: AuthServicePort = {
  login: async () => {
    throw notConfigured('authService');
  },
};

const unconfiguredVerifier: TokenVerifierPort = {
  verify: () => {
    throw new AuthenticationFailure('invalid', 'Token invalid', { cause: notConfigured('tokenVerifier') });
  },
};

export function createApp(deps: Partial<AppDeps> = {}): Application {
  const app = express();
  const logger = deps.logger ?? defaultLogger;

  const pipeline: RoutePipelineDeps = {
    authenticator: new TokenAuthenticator(deps.tokenVerifier ?? unconfiguredVerifier),
    // Bodies stay text; the route pipeline reads them after authentication
    // and the payload validator parses them
    bodyParser: express.text({ type: JSON_CONTENT_TYPES, limit: deps.bodyLimit ?? config.jsonBodyLimit }),
    logger,
  };

  app.disable('x-powered-by');

  // Correlation id first: every later stage, including failures, can read it
  app.use(createCorrelationIdMiddleware(logger));
  app.use(createAccessLogMiddleware(logger));

  app.use(createSystemRoutes({ service: config.serviceName, version: config.serviceVersion }, pipeline));
  app.use(createAuthRoutes(deps.authService ?? unconfiguredAuth, pipeline));
  app.use(createUserRoutes(deps.userService ?? unconfiguredUsers, pipeline));

  app.use(createNotFoundHandler(logger));
  app.use(createErrorHandler(logger));

  return app;
}
