/**
 * User API Routes
 *
 * - POST /users - Register the caller
 * - GET /users/:address - Profile snapshot
 * - POST /users/:address/verify - Owner: verify a user
 * - PUT /users/:address/first-responder - Owner: set first-responder flag
 * - POST /emergency-services - Owner: designate an emergency service
 * - GET /emergency-services/:address - Check designation
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { RegistryService } from '../services/registry.js';
import { addressSchema } from '../utils/address.js';
import { requireCaller, getCaller, type CallerRequest } from './middleware.js';
import { emergencyServiceSchema, firstResponderSchema, registerUserSchema } from './schemas.js';

export function createUserRouter(registry: RegistryService): Router {
  const router = Router();

  router.post('/users', requireCaller, (req: CallerRequest, res: Response) => {
    const { contactInfo } = registerUserSchema.parse(req.body);
    const profile = registry.registerUser(getCaller(req), contactInfo);

    res.status(201).json(profile);
  });

  router.get('/users/:address', (req: Request, res: Response) => {
    const address = addressSchema.parse(req.params.address);
    res.json(registry.getUserProfile(address));
  });

  router.post('/users/:address/verify', requireCaller, (req: CallerRequest, res: Response) => {
    const address = addressSchema.parse(req.params.address);
    registry.verifyUser(getCaller(req), address);

    res.json(registry.getUserProfile(address));
  });

  router.put('/users/:address/first-responder', requireCaller, (req: CallerRequest, res: Response) => {
    const address = addressSchema.parse(req.params.address);
    const { isFirstResponder } = firstResponderSchema.parse(req.body);
    registry.setFirstResponder(getCaller(req), address, isFirstResponder);

    res.json(registry.getUserProfile(address));
  });

  router.post('/emergency-services', requireCaller, (req: CallerRequest, res: Response) => {
    const { address } = emergencyServiceSchema.parse(req.body);
    registry.addEmergencyService(getCaller(req), address);

    res.status(201).json({ address, isEmergencyService: true });
  });

  router.get('/emergency-services/:address', (req: Request, res: Response) => {
    const address = addressSchema.parse(req.params.address);
    res.json({ address, isEmergencyService: registry.isEmergencyService(address) });
  });

  return router;
}
