/**
 * Alert API Routes
 *
 * - POST /alerts - Report an alert
 * - GET /alerts - Total count and active ids
 * - GET /alerts/active - Active alert ids, ascending
 * - GET /alerts/:id - Alert snapshot
 * - GET /alerts/:id/responders - Responders in arrival order
 * - POST /alerts/:id/responses - Volunteer as responder
 * - POST /alerts/:id/resolution - Close as RESOLVED or FALSE_ALARM
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { RegistryService } from '../services/registry.js';
import type { AlertSummaryResponse } from '../types/index.js';
import { requireCaller, getCaller, type CallerRequest } from './middleware.js';
import { createAlertSchema, idParamSchema, resolveAlertSchema } from './schemas.js';

export function createAlertRouter(registry: RegistryService): Router {
  const router = Router();

  router.post('/', requireCaller, (req: CallerRequest, res: Response) => {
    const body = createAlertSchema.parse(req.body);
    const alertId = registry.createAlert(getCaller(req), body);

    res.status(201).json(registry.getAlert(alertId));
  });

  router.get('/', (_req: Request, res: Response) => {
    const response: AlertSummaryResponse = {
      total: registry.getTotalAlerts(),
      active: registry.getActiveAlerts(),
    };
    res.json(response);
  });

  router.get('/active', (_req: Request, res: Response) => {
    res.json({ alertIds: registry.getActiveAlerts() });
  });

  router.get('/:id', (req: Request, res: Response) => {
    const alertId = idParamSchema.parse(req.params.id);
    res.json(registry.getAlert(alertId));
  });

  router.get('/:id/responders', (req: Request, res: Response) => {
    const alertId = idParamSchema.parse(req.params.id);
    res.json({ alertId, responders: registry.getAlertResponders(alertId) });
  });

  router.post('/:id/responses', requireCaller, (req: CallerRequest, res: Response) => {
    const alertId = idParamSchema.parse(req.params.id);
    registry.respondToAlert(getCaller(req), alertId);

    res.status(201).json({ alertId, responders: registry.getAlertResponders(alertId) });
  });

  router.post('/:id/resolution', requireCaller, (req: CallerRequest, res: Response) => {
    const alertId = idParamSchema.parse(req.params.id);
    const { status } = resolveAlertSchema.parse(req.body);
    registry.resolveAlert(getCaller(req), alertId, status);

    res.json(registry.getAlert(alertId));
  });

  return router;
}
