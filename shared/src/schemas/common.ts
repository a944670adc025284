/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';
import {
  ORDER_STATUSES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  RETURN_STATUSES,
  SHIPPING_SERVICE_LEVELS,
} from '../domain/constants.js';

// Numeric ids arrive as strings from URLs and sometimes from the model
export const idSchema = z.coerce.number().int().positive();

export const idParamSchema = z.object({
  id: idSchema,
});

export const orderStatusSchema = z.enum(ORDER_STATUSES);
export const ticketPrioritySchema = z.enum(TICKET_PRIORITIES);
export const ticketStatusSchema = z.enum(TICKET_STATUSES);
export const returnStatusSchema = z.enum(RETURN_STATUSES);
export const shippingServiceLevelSchema = z.enum(SHIPPING_SERVICE_LEVELS);

/** Optional free text; blank strings count as absent */
export const optionalTextSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));
