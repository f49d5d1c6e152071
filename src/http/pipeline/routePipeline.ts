// src/http/pipeline/routePipeline.ts

/**
 * Request pipeline
 *
 * Fixed stage order per route:
 *   [authenticate if access = bearer] -> [read body] -> [validate payload] -> handle
 *
 * The body is not read until the caller is authenticated.
 *
 * Correlation tagging and the access log run before this as app-level
 * middleware. Every stage returns proceed/abort; the first abort skips the
 * rest and goes straight to the envelope.
 */

import type { NextFunction, Request, RequestHandler, Response, Router } from 'express';

import type { AuthenticatedIdentity } from '../../auth/domain/AuthenticatedIdentity';
import type { AppLogger } from '../../shared/logging/Logger';
import { ValidationFailure } from '../../shared/errors/DomainErrors';
import { requestScope } from '../context/requestContext';
import { classifyError } from '../errors/errorClassifier';
import type { TokenAuthenticator } from '../auth/tokenAuthenticator';
import { PayloadSchema, validatePayload } from '../validation/payloadValidator';
import type { RouteOutcome } from './routeOutcome';
import { sendFailure, sendOutcome } from './sendEnvelope';
import { StageResult, abort, andThen, andThenAsync, proceed } from './stage';

export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

export type RouteContext = {
  requestId: string;
  log: AppLogger;
  params: Request['params'];
  query: Record<string, unknown>;
};

export type AuthenticatedRouteContext = RouteContext & {
  identity: AuthenticatedIdentity;
};

type RouteBase<TInput> = {
  method: HttpMethod;
  path: string;
  body: PayloadSchema<TInput>;
};

export type PublicRoute<TInput, TResult> = RouteBase<TInput> & {
  access: 'public';
  handle(ctx: RouteContext, input: TInput): Promise<RouteOutcome<TResult>>;
};

export type ProtectedRoute<TInput, TResult> = RouteBase<TInput> & {
  access: 'bearer';
  handle(ctx: AuthenticatedRouteContext, input: TInput): Promise<RouteOutcome<TResult>>;
};

export type RouteDefinition<TInput, TResult> = PublicRoute<TInput, TResult> | ProtectedRoute<TInput, TResult>;

export function publicRoute<TInput, TResult>(
  route: Omit<PublicRoute<TInput, TResult>, 'access'>,
): PublicRoute<TInput, TResult> {
  return { ...route, access: 'public' };
}

/**
 * A route that runs only for callers with a valid bearer token.
 */
export function protectedRoute<TInput, TResult>(
  route: Omit<ProtectedRoute<TInput, TResult>, 'access'>,
): ProtectedRoute<TInput, TResult> {
  return { ...route, access: 'bearer' };
}

/**
 * A single-valued path parameter. Repeated or missing values are rejected as
 * parameter errors.
 */
export function pathParam(ctx: RouteContext, key: string): string {
  const value: unknown = ctx.params[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationFailure(
      `Invalid path parameter "${key}"`,
      [{ field: key, message: `"${key}" must be a single value.` }],
      'param',
    );
  }
  return value;
}

/**
 * Transport-independent view of the request the stages read.
 * `readBody` is only called for routes that take a payload.
 */
export type PipelineRequest = {
  authorization: string | undefined;
  readBody: () => Promise<unknown>;
  context: RouteContext;
};

/**
 * A route with its pipeline already composed, ready to mount on a router.
 */
export type RouteBinding = {
  method: HttpMethod;
  path: string;
  handler: RequestHandler;
};

async function readBody(schema: PayloadSchema<unknown>, request: PipelineRequest): Promise<StageResult<unknown>> {
  if (schema.kind === 'none') return proceed(undefined);

  try {
    return proceed(await request.readBody());
  } catch (err) {
    return abort(classifyError(err));
  }
}

async function validateThenHandle<TInput, TResult>(
  schema: PayloadSchema<TInput>,
  request: PipelineRequest,
  handle: (input: TInput) => Promise<RouteOutcome<TResult>>,
): Promise<StageResult<RouteOutcome<TResult>>> {
  const body = await readBody(schema, request);

  return andThenAsync(andThen(body, (raw) => validatePayload(schema, raw)), async (input) => {
    try {
      return proceed(await handle(input));
    } catch (err) {
      return abort(classifyError(err));
    }
  });
}

export async function runRoute<TInput, TResult>(
  route: RouteDefinition<TInput, TResult>,
  request: PipelineRequest,
  authenticator: Pick<TokenAuthenticator, 'authenticate'>,
): Promise<StageResult<RouteOutcome<TResult>>> {
  if (route.access === 'bearer') {
    const guarded = route;
    return andThenAsync(authenticator.authenticate(request.authorization), (identity) =>
      validateThenHandle(guarded.body, request, (input) =>
        guarded.handle({ ...request.context, identity }, input),
      ),
    );
  }

  const open = route;
  return validateThenHandle(open.body, request, (input) => open.handle(request.context, input));
}

export type RoutePipelineDeps = {
  authenticator: Pick<TokenAuthenticator, 'authenticate'>;
  /**
   * Body reader run after authentication; leaves the raw text on `req.body`.
   */
  bodyParser: RequestHandler;
  logger: AppLogger;
};

function bodyReader(req: Request, res: Response, parser: RequestHandler): () => Promise<unknown> {
  return () =>
    new Promise<unknown>((resolve, reject) => {
      const next: NextFunction = (err?: unknown) => {
        if (err) reject(err);
        else resolve(req.body);
      };

      Promise.resolve(parser(req, res, next)).catch(reject);
    });
}

export function bindRoute<TInput, TResult>(
  route: RouteDefinition<TInput, TResult>,
  deps: RoutePipelineDeps,
): RouteBinding {
  const handler = async (req: Request, res: Response): Promise<void> => {
    const scope = requestScope(req, deps.logger);

    const result = await runRoute(
      route,
      {
        authorization: req.header('authorization'),
        readBody: bodyReader(req, res, deps.bodyParser),
        context: {
          requestId: scope.requestId,
          log: scope.log,
          params: req.params,
          query: req.query,
        },
      },
      deps.authenticator,
    );

    if (result.ok) {
      sendOutcome(res, scope, result.value);
    } else {
      sendFailure(res, scope, result.error);
    }
  };

  return { method: route.method, path: route.path, handler };
}

/**
 * Returns a function that composes a route's pipeline and mounts it on `router`.
 */
export function routeMounter(
  router: Router,
  deps: RoutePipelineDeps,
): <TInput, TResult>(route: RouteDefinition<TInput, TResult>) => void {
  return (route) => {
    const binding = bindRoute(route, deps);
    router[binding.method](binding.path, binding.handler);
  };
}
