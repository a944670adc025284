/**
 * Database table types for Kysely
 *
 * Columns read back differently per driver: pg returns timestamptz as Date
 * and numeric as string, SQLite returns the ISO text and REAL it was given.
 * Writes always use ISO strings and JS numbers. Row mappers in
 * ./queries/rowMappers.ts normalize reads.
 */

import type { ColumnType, Generated, Selectable } from 'kysely';
import type {
    OrderStatus,
    ReturnStatus,
    ShippingServiceLevel,
    TicketPriority,
    TicketStatus,
} from '@supportdesk/shared';

export type Timestamp = ColumnType<Date | string, string, string>;
export type Money = ColumnType<number | string, number, number>;

export interface ProductTable {
    id: Generated<number>;
    name: string;
    specifications: string | null;
    description: string | null;
    price: Money;
    category: string | null;
    stockQuantity: number;
    createdAt: Timestamp;
}

export interface OrderTable {
    id: Generated<number>;
    customerName: string;
    customerEmail: string | null;
    customerPhone: string | null;
    shippingAddress: string;
    totalAmount: Money;
    status: OrderStatus;
    createdAt: Timestamp;
    updatedAt: Timestamp;
}

export interface OrderItemTable {
    id: Generated<number>;
    orderId: number;
    productId: number;
    quantity: number;
    priceAtPurchase: Money;
}

export interface SupportTicketTable {
    id: Generated<number>;
    customerName: string;
    customerEmail: string | null;
    productId: number | null;
    issueDescription: string;
    priority: TicketPriority;
    status: TicketStatus;
    assignedTo: string | null;
    createdAt: Timestamp;
    updatedAt: Timestamp;
    resolvedAt: Timestamp | null;
}

export interface ReturnOrderTable {
    id: Generated<number>;
    orderId: number;
    reason: string;
    status: ReturnStatus;
    refundTotalAmount: Money;
    createdAt: Timestamp;
    updatedAt: Timestamp;
    processedAt: Timestamp | null;
}

export interface ReturnItemTable {
    id: Generated<number>;
    returnId: number;
    productId: number;
    quantity: number;
    priceAtPurchase: Money;
    refundAmount: Money;
}

export interface ShippingRateTable {
    id: Generated<number>;
    carrier: string;
    serviceType: ShippingServiceLevel;
    zipCode: string;
    baseRate: Money;
    perLbRate: Money;
    estimatedDays: number | null;
}

export interface DB {
    Product: ProductTable;
    Order: OrderTable;
    OrderItem: OrderItemTable;
    SupportTicket: SupportTicketTable;
    ReturnOrder: ReturnOrderTable;
    ReturnItem: ReturnItemTable;
    ShippingRate: ShippingRateTable;
}

export type ProductRow = Selectable<ProductTable>;
export type OrderRow = Selectable<OrderTable>;
export type SupportTicketRow = Selectable<SupportTicketTable>;
export type ReturnOrderRow = Selectable<ReturnOrderTable>;
export type ShippingRateRow = Selectable<ShippingRateTable>;
