/**
 * Neighborhood API Routes
 *
 * - POST /neighborhoods - Verified users create a neighborhood
 * - GET /neighborhoods - Total count
 * - GET /neighborhoods/:id - Neighborhood snapshot
 * - POST /neighborhoods/:id/residents - Join as resident
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { RegistryService } from '../services/registry.js';
import { requireCaller, getCaller, type CallerRequest } from './middleware.js';
import { createNeighborhoodSchema, idParamSchema } from './schemas.js';

export function createNeighborhoodRouter(registry: RegistryService): Router {
  const router = Router();

  router.post('/', requireCaller, (req: CallerRequest, res: Response) => {
    const body = createNeighborhoodSchema.parse(req.body);
    const neighborhoodId = registry.createNeighborhood(getCaller(req), body);

    res.status(201).json(registry.getNeighborhood(neighborhoodId));
  });

  router.get('/', (_req: Request, res: Response) => {
    res.json({ total: registry.getTotalNeighborhoods() });
  });

  router.get('/:id', (req: Request, res: Response) => {
    const neighborhoodId = idParamSchema.parse(req.params.id);
    res.json(registry.getNeighborhood(neighborhoodId));
  });

  router.post('/:id/residents', requireCaller, (req: CallerRequest, res: Response) => {
    const neighborhoodId = idParamSchema.parse(req.params.id);
    registry.joinNeighborhood(getCaller(req), neighborhoodId);

    res.status(201).json(registry.getNeighborhood(neighborhoodId));
  });

  return router;
}
