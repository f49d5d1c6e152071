// src/http/routes/userRoutes.ts

/**
 * /api/users routes
 *
 * - Keep HTTP boundary thin (declare access + schema -> call service -> outcome).
 * - Errors are thrown by the service and classified by the pipeline.
 */

import { Router } from 'express';

import type { User } from '../../users/domain/User';
import type { UserListing } from '../../users/application/UserService';
import {
  CreateUserDto,
  PaginationQuery,
  UpdateUserDto,
  createUserSchema,
  parsePaginationQuery,
  updateUserSchema,
} from '../../users/dto/UserDtos';
import { noPayload } from '../validation/payloadValidator';
import {
  RoutePipelineDeps,
  pathParam,
  protectedRoute,
  publicRoute,
  routeMounter,
} from '../pipeline/routePipeline';
import { created, ok, page } from '../pipeline/routeOutcome';

export interface UserServicePort {
  register(dto: CreateUserDto): Promise<User>;
  getUser(id: string): Promise<User>;
  listUsers(query: PaginationQuery): Promise<UserListing>;
  updateProfile(actorId: string, targetId: string, patch: UpdateUserDto): Promise<User>;
}

export function createUserRoutes(users: UserServicePort, pipeline: RoutePipelineDeps): Router {
  const router = Router();
  const mount = routeMounter(router, pipeline);

  /**
   * POST /api/users/create
   * Public registration. Taken email/username -> 409.
   */
  mount(
    publicRoute({
      method: 'post',
      path: '/api/users/create',
      body: createUserSchema,
      handle: async (_ctx, dto) => created(await users.register(dto)),
    }),
  );

  /**
   * GET /api/users/list?page=1&pageSize=20
   * Newest first.
   */
  mount(
    protectedRoute({
      method: 'get',
      path: '/api/users/list',
      body: noPayload,
      handle: async (ctx) => {
        const query = parsePaginationQuery(ctx.query);
        const listing = await users.listUsers(query);
        return page(listing.items, listing.total, query.page, query.pageSize);
      },
    }),
  );

  mount(
    protectedRoute({
      method: 'get',
      path: '/api/users/me',
      body: noPayload,
      handle: async (ctx) => ok(await users.getUser(ctx.identity.subjectId)),
    }),
  );

  mount(
    protectedRoute({
      method: 'get',
      path: '/api/users/:id',
      body: noPayload,
      handle: async (ctx) => ok(await users.getUser(pathParam(ctx, 'id'))),
    }),
  );

  /**
   * PUT /api/users/:id
   * Profile update; only the owner may call it (403 otherwise).
   */
  mount(
    protectedRoute({
      method: 'put',
      path: '/api/users/:id',
      body: updateUserSchema,
      handle: async (ctx, patch) =>
        ok(await users.updateProfile(ctx.identity.subjectId, pathParam(ctx, 'id'), patch)),
    }),
  );

  return router;
}
