/**
 * Chat Tool Argument Schemas
 *
 * Validate the arguments the model sends with each tool call. The JSON
 * schemas advertised to the model are declared beside the tool definitions
 * on the server; these are the runtime check.
 */

import { z } from 'zod';
import {
  idSchema,
  optionalTextSchema,
  shippingServiceLevelSchema,
  ticketPrioritySchema,
} from './common.js';

const productIdListSchema = z.array(idSchema);
const quantityListSchema = z.array(z.coerce.number().int().positive('Quantities must be positive whole numbers'));

export const createOrderArgsSchema = z
  .object({
    customerName: z.string().trim().min(1, 'customerName is required'),
    customerEmail: z.string().trim().min(1, 'customerEmail is required'),
    customerPhone: z.string().trim().min(1, 'customerPhone is required'),
    shippingAddress: z.string().trim().min(1, 'shippingAddress is required'),
    productIds: productIdListSchema.min(1, 'At least one product is required'),
    quantities: quantityListSchema.min(1, 'At least one quantity is required'),
  })
  .refine((args) => args.productIds.length === args.quantities.length, {
    message: 'Product IDs and quantities must have the same length',
    path: ['quantities'],
  });

export const draftOrderArgsSchema = z.object({
  customerName: optionalTextSchema,
  customerEmail: optionalTextSchema,
  customerPhone: optionalTextSchema,
  shippingAddress: optionalTextSchema,
  productIds: productIdListSchema.optional(),
  // Draft validation reports bad quantities itself, so accept any number here
  quantities: z.array(z.coerce.number()).optional(),
});

export const orderStatusArgsSchema = z.object({
  orderId: idSchema,
});

export const productCatalogArgsSchema = z.object({
  category: optionalTextSchema,
  searchQuery: optionalTextSchema,
});

export const checkInventoryArgsSchema = z.object({
  productId: idSchema,
});

export const estimateShippingArgsSchema = z.object({
  destinationZip: z.string().trim().min(1, 'destinationZip is required'),
  weightLbs: z.coerce.number().positive('weightLbs must be greater than zero'),
  serviceLevel: shippingServiceLevelSchema.optional(),
});

export const createSupportTicketArgsSchema = z.object({
  customerName: z.string().trim().min(1, 'customerName is required'),
  customerEmail: optionalTextSchema,
  issueDescription: z.string().trim().min(1, 'issueDescription is required'),
  priority: ticketPrioritySchema.default('medium'),
  productId: idSchema.optional(),
});

export const initiateReturnArgsSchema = z.object({
  orderId: idSchema,
  returnReason: z.string().trim().min(1, 'returnReason is required'),
  productIds: productIdListSchema.optional(),
  quantities: quantityListSchema.optional(),
});

export const searchKnowledgeBaseArgsSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
});
