/**
 * Status, priority and service-level vocabularies.
 *
 * The arrays are the single source of truth: zod schemas, the chat tool
 * definitions and the database layer all derive from them.
 */

export const ORDER_STATUSES = ['pending', 'processing', 'shipped', 'delivered', 'cancelled'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const TICKET_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export const TICKET_STATUSES = ['open', 'in_progress', 'resolved', 'closed'] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const RETURN_STATUSES = ['pending', 'approved', 'rejected', 'processed'] as const;
export type ReturnStatus = (typeof RETURN_STATUSES)[number];

export const SHIPPING_SERVICE_LEVELS = ['standard', 'express', 'overnight'] as const;
export type ShippingServiceLevel = (typeof SHIPPING_SERVICE_LEVELS)[number];

/** Zip code of the rates that apply when a destination has none of its own */
export const CATCH_ALL_ZIP = '*';

export const INITIAL_ORDER_STATUS: OrderStatus = 'pending';
export const INITIAL_TICKET_STATUS: TicketStatus = 'open';
export const INITIAL_RETURN_STATUS: ReturnStatus = 'pending';

/** Ticket status that stamps `resolvedAt` */
export const TICKET_RESOLVED_STATUS: TicketStatus = 'resolved';

/** Return status that stamps `processedAt` */
export const RETURN_PROCESSED_STATUS: ReturnStatus = 'processed';
