/**
 * Row mappers
 *
 * Turn raw Kysely rows into the shared entity types. pg and SQLite disagree
 * on how timestamps and numerics come back; everything past this file sees
 * ISO strings and numbers.
 */

import type {
    Order,
    Product,
    ReturnOrder,
    ShippingRate,
    SupportTicket,
} from '@supportdesk/shared';
import type {
    OrderRow,
    ProductRow,
    ReturnOrderRow,
    ShippingRateRow,
    SupportTicketRow,
} from '../types.js';

export function toIso(value: Date | string): string {
    return (value instanceof Date ? value : new Date(value)).toISOString();
}

export function toIsoOrNull(value: Date | string | null): string | null {
    return value === null ? null : toIso(value);
}

export function toNumber(value: number | string | bigint): number {
    return typeof value === 'number' ? value : Number(value);
}

/** Current time as written to timestamp columns */
export function nowIso(): string {
    return new Date().toISOString();
}

export function toProduct(row: ProductRow): Product {
    return {
        id: row.id,
        name: row.name,
        specifications: row.specifications,
        description: row.description,
        price: toNumber(row.price),
        category: row.category,
        stockQuantity: row.stockQuantity,
        createdAt: toIso(row.createdAt),
    };
}

export function toOrder(row: OrderRow): Order {
    return {
        id: row.id,
        customerName: row.customerName,
        customerEmail: row.customerEmail,
        customerPhone: row.customerPhone,
        shippingAddress: row.shippingAddress,
        totalAmount: toNumber(row.totalAmount),
        status: row.status,
        createdAt: toIso(row.createdAt),
        updatedAt: toIso(row.updatedAt),
    };
}

export function toSupportTicket(row: SupportTicketRow): SupportTicket {
    return {
        id: row.id,
        customerName: row.customerName,
        customerEmail: row.customerEmail,
        productId: row.productId,
        issueDescription: row.issueDescription,
        priority: row.priority,
        status: row.status,
        assignedTo: row.assignedTo,
        createdAt: toIso(row.createdAt),
        updatedAt: toIso(row.updatedAt),
        resolvedAt: toIsoOrNull(row.resolvedAt),
    };
}

export function toReturnOrder(row: ReturnOrderRow): ReturnOrder {
    return {
        id: row.id,
        orderId: row.orderId,
        reason: row.reason,
        status: row.status,
        refundTotalAmount: toNumber(row.refundTotalAmount),
        createdAt: toIso(row.createdAt),
        updatedAt: toIso(row.updatedAt),
        processedAt: toIsoOrNull(row.processedAt),
    };
}

export function toShippingRate(row: ShippingRateRow): ShippingRate {
    return {
        id: row.id,
        carrier: row.carrier,
        serviceType: row.serviceType,
        zipCode: row.zipCode,
        baseRate: toNumber(row.baseRate),
        perLbRate: toNumber(row.perLbRate),
        estimatedDays: row.estimatedDays,
    };
}
