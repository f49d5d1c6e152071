// src/http/routes/authRoutes.ts

import { Router } from 'express';

import type { AccessToken } from '../../auth/application/AuthService';
import { LoginDto, loginSchema } from '../../auth/dto/LoginDto';
import { RoutePipelineDeps, publicRoute, routeMounter } from '../pipeline/routePipeline';
import { ok } from '../pipeline/routeOutcome';

export interface AuthServicePort {
  login(dto: LoginDto): Promise<AccessToken>;
}

export function createAuthRoutes(auth: AuthServicePort, pipeline: RoutePipelineDeps): Router {
  const router = Router();
  const mount = routeMounter(router, pipeline);

  /**
   * POST /api/auth/login
   * Receives: { email, password }
   * Returns: bearer token for the protected routes.
   */
  mount(
    publicRoute({
      method: 'post',
      path: '/api/auth/login',
      body: loginSchema,
      handle: async (_ctx, dto) => ok(await auth.login(dto)),
    }),
  );

  return router;
}
