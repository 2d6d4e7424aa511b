/**
 * Request validation schemas shared by the routers
 */

import { z } from 'zod';
import { addressSchema } from '../utils/address.js';
import { ALERT_STATUSES, ALERT_TYPES } from '../types/index.js';

/** Fixed-point coordinate or integer distance */
const fixedPoint = z.number().int().safe();

/** Decimal digits only; hex and exponent spellings are rejected */
export const idParamSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal id')
  .transform(Number)
  .pipe(z.number().safe());

export const registerUserSchema = z.object({
  contactInfo: z.string(),
});

export const firstResponderSchema = z.object({
  isFirstResponder: z.boolean(),
});

export const emergencyServiceSchema = z.object({
  address: addressSchema,
});

export const createAlertSchema = z.object({
  alertType: z.enum(ALERT_TYPES),
  location: z.string(),
  description: z.string(),
  latitude: fixedPoint,
  longitude: fixedPoint,
  radius: fixedPoint,
});

export const resolveAlertSchema = z.object({
  status: z.enum(ALERT_STATUSES),
});

export const createNeighborhoodSchema = z.object({
  name: z.string(),
  centerLat: fixedPoint,
  centerLng: fixedPoint,
  radius: fixedPoint,
});

export const eventsQuerySchema = z.object({
  since: z.coerce.number().int().min(0).optional().default(0),
});
