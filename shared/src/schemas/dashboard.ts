/**
 * Dashboard Query & Mutation Schemas
 *
 * Query-string filters for the table views and bodies for status updates.
 */

import { z } from 'zod';
import {
  optionalTextSchema,
  orderStatusSchema,
  returnStatusSchema,
  shippingServiceLevelSchema,
  ticketPrioritySchema,
  ticketStatusSchema,
} from './common.js';

export const productListQuerySchema = z.object({
  category: optionalTextSchema,
  search: optionalTextSchema,
});

export const orderListQuerySchema = z.object({
  status: orderStatusSchema.optional(),
});

export const ticketListQuerySchema = z.object({
  status: ticketStatusSchema.optional(),
  priority: ticketPrioritySchema.optional(),
});

export const returnListQuerySchema = z.object({
  status: returnStatusSchema.optional(),
  orderId: z.coerce.number().int().positive().optional(),
  sinceDays: z.coerce.number().int().positive().optional(),
});

export const shippingRateQuerySchema = z.object({
  carrier: optionalTextSchema,
  serviceType: shippingServiceLevelSchema.optional(),
});

export const shippingEstimateQuerySchema = z.object({
  zip: z.string().trim().min(1, 'zip is required'),
  weight: z.coerce.number().positive('weight must be greater than zero'),
  serviceLevel: shippingServiceLevelSchema.optional(),
});

export const updateOrderStatusSchema = z.object({
  status: orderStatusSchema,
});

export const updateTicketStatusSchema = z.object({
  status: ticketStatusSchema,
});

export const updateReturnStatusSchema = z.object({
  status: returnStatusSchema,
});
