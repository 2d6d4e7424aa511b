import { Router } from 'express';
import type { Request, Response } from 'express';
import type { RegistryService } from '../services/registry.js';
import type { HealthResponse } from '../types/index.js';
import { getPrometheusMetrics } from '../utils/metrics.js';
import { eventsQuerySchema } from './schemas.js';

/**
 * Health, metrics and the notification feed
 */
export function createPublicRouter(registry: RegistryService): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      status: 'healthy',
      users: registry.getTotalUsers(),
      alerts: registry.getTotalAlerts(),
      neighborhoods: registry.getTotalNeighborhoods(),
    };
    res.json(response);
  });

  /**
   * GET /metrics
   * Prometheus metrics endpoint
   */
  router.get('/metrics', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(getPrometheusMetrics(registry));
  });

  /**
   * GET /api/events?since=n
   * Notifications with seq > since, oldest first
   */
  router.get('/api/events', (req: Request, res: Response) => {
    const { since } = eventsQuerySchema.parse(req.query);
    res.json({ events: registry.getEvents(since) });
  });

  return router;
}
