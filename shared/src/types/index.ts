/**
 * Entity types shared between the server, the chat agent and the CLI.
 *
 * Money values are plain numbers rounded to cents; timestamps are ISO strings.
 */

import type {
    OrderStatus,
    TicketPriority,
    TicketStatus,
    ReturnStatus,
    ShippingServiceLevel,
} from '../domain/constants.js';

// ============================================
// CATALOG
// ============================================

export interface Product {
    id: number;
    name: string;
    specifications: string | null;
    description: string | null;
    price: number;
    category: string | null;
    stockQuantity: number;
    createdAt: string;
}

// ============================================
// ORDERS
// ============================================

export interface OrderItem {
    id: number;
    orderId: number;
    productId: number;
    productName: string;
    quantity: number;
    priceAtPurchase: number;
}

export interface Order {
    id: number;
    customerName: string;
    customerEmail: string | null;
    customerPhone: string | null;
    shippingAddress: string;
    totalAmount: number;
    status: OrderStatus;
    createdAt: string;
    updatedAt: string;
}

export interface OrderWithItems extends Order {
    items: OrderItem[];
}

// ============================================
// SUPPORT TICKETS
// ============================================

export interface SupportTicket {
    id: number;
    customerName: string;
    customerEmail: string | null;
    productId: number | null;
    issueDescription: string;
    priority: TicketPriority;
    status: TicketStatus;
    assignedTo: string | null;
    createdAt: string;
    updatedAt: string;
    resolvedAt: string | null;
}

// ============================================
// RETURNS
// ============================================

export interface ReturnItem {
    id: number;
    returnId: number;
    productId: number;
    productName: string;
    quantity: number;
    priceAtPurchase: number;
    refundAmount: number;
}

export interface ReturnOrder {
    id: number;
    orderId: number;
    reason: string;
    status: ReturnStatus;
    refundTotalAmount: number;
    createdAt: string;
    updatedAt: string;
    processedAt: string | null;
}

export interface ReturnOrderWithItems extends ReturnOrder {
    items: ReturnItem[];
}

// ============================================
// SHIPPING
// ============================================

export interface ShippingRate {
    id: number;
    carrier: string;
    serviceType: ShippingServiceLevel;
    /** Destination ZIP code, or `*` for the catch-all rate of a service */
    zipCode: string;
    baseRate: number;
    perLbRate: number;
    estimatedDays: number | null;
}

export interface ShippingEstimate {
    carrier: string;
    serviceType: ShippingServiceLevel;
    estimatedCost: number;
    estimatedDays: number | null;
}

// ============================================
// KNOWLEDGE BASE
// ============================================

export interface KnowledgeArticle {
    id: number;
    title: string;
    content: string;
    category: string;
    url: string;
}

export interface ScoredArticle extends KnowledgeArticle {
    relevanceScore: number;
}

/** Standard operating procedure for one chat tool */
export interface Procedure {
    tool: string;
    title: string;
    content: string;
}
