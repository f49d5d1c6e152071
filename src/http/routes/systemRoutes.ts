// src/http/routes/systemRoutes.ts

import { Router } from 'express';

import { noPayload } from '../validation/payloadValidator';
import { RoutePipelineDeps, publicRoute, routeMounter } from '../pipeline/routePipeline';
import { ok } from '../pipeline/routeOutcome';

export type ServiceInfo = {
  service: string;
  version: string;
};

export function createSystemRoutes(info: ServiceInfo, pipeline: RoutePipelineDeps): Router {
  const router = Router();
  const mount = routeMounter(router, pipeline);

  // Healthcheck endpoint used by Kubernetes / monitors
  mount(
    publicRoute({
      method: 'get',
      path: '/health',
      body: noPayload,
      handle: async () => ok({ status: 'ok', service: info.service }),
    }),
  );

  mount(
    publicRoute({
      method: 'get',
      path: '/api',
      body: noPayload,
      handle: async () => ok(info),
    }),
  );

  return router;
}
