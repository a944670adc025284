/**
 * Draft Order Validation
 *
 * Checks which order fields a customer has supplied so far and, once every
 * field is present, prices the order and checks stock. No side effects, no
 * database calls: the caller passes in the catalogue entries it looked up.
 */

import { formatCurrency, joinWithAnd } from '../formatting.js';
import {
    zipOrderLines,
    priceOrderLines,
    isPositiveWholeNumber,
    type Catalog,
    type PricedLine,
} from './pricing.js';

// ============================================
// TYPES
// ============================================

export interface DraftOrderInput {
    customerName?: string;
    customerEmail?: string;
    customerPhone?: string;
    shippingAddress?: string;
    productIds?: number[];
    quantities?: number[];
}

export const DRAFT_ORDER_FIELDS = [
    'customerName',
    'customerEmail',
    'customerPhone',
    'shippingAddress',
    'productIds',
    'quantities',
] as const;

export type DraftOrderField = (typeof DRAFT_ORDER_FIELDS)[number];

const FIELD_LABELS: Record<DraftOrderField, string> = {
    customerName: 'full name',
    customerEmail: 'email address',
    customerPhone: 'phone number',
    shippingAddress: 'shipping address',
    productIds: 'products',
    quantities: 'quantities',
};

export interface OrderSummary {
    customerName: string;
    customerEmail: string;
    customerPhone: string;
    shippingAddress: string;
    products: PricedLine[];
    totalCost: number;
}

interface DraftFieldReport {
    providedFields: DraftOrderField[];
    missingFields: DraftOrderField[];
}

export type DraftOrderResult =
    | (DraftFieldReport & { success: true; readyToOrder: false; message: string })
    | (DraftFieldReport & {
        success: true;
        readyToOrder: true;
        message: string;
        orderSummary: OrderSummary;
        nextStep: string;
    })
    | (DraftFieldReport & { success: false; readyToOrder: false; error: string });

// ============================================
// HELPERS
// ============================================

function isPresent(value: string | number[] | undefined): boolean {
    if (value === undefined) return false;
    if (typeof value === 'string') return value.trim().length > 0;
    return value.length > 0;
}

/** Split the fields into provided and missing, in the fixed field order */
export function reportDraftFields(input: DraftOrderInput): DraftFieldReport {
    const providedFields: DraftOrderField[] = [];
    const missingFields: DraftOrderField[] = [];

    for (const field of DRAFT_ORDER_FIELDS) {
        if (isPresent(input[field])) {
            providedFields.push(field);
        } else {
            missingFields.push(field);
        }
    }

    return { providedFields, missingFields };
}

export function describeMissingFields(fields: readonly DraftOrderField[]): string {
    return joinWithAnd(fields.map(f => FIELD_LABELS[f]));
}

// ============================================
// MAIN FUNCTION
// ============================================

/**
 * Evaluate a draft order.
 *
 * @param input - Whatever the customer has supplied so far
 * @param catalog - Catalogue entries for the requested product ids (may be empty)
 *
 * @example
 * evaluateDraftOrder({ customerName: 'Sam' }, new Map())
 * // { success: true, readyToOrder: false, missingFields: ['customerEmail', ...], ... }
 */
export function evaluateDraftOrder(input: DraftOrderInput, catalog: Catalog): DraftOrderResult {
    const report = reportDraftFields(input);
    const { productIds = [], quantities = [] } = input;

    if (productIds.length > 0 && quantities.length > 0) {
        if (productIds.length !== quantities.length) {
            return { ...report, success: false, readyToOrder: false, error: 'Product IDs and quantities must have the same length' };
        }
        if (!quantities.every(isPositiveWholeNumber)) {
            return { ...report, success: false, readyToOrder: false, error: 'Quantities must be positive whole numbers' };
        }
    }

    if (report.missingFields.length > 0) {
        return {
            ...report,
            success: true,
            readyToOrder: false,
            message: `Still needed to place the order: ${describeMissingFields(report.missingFields)}.`,
        };
    }

    const lines = zipOrderLines(productIds, quantities) ?? [];
    const pricing = priceOrderLines(lines, catalog);
    if (!pricing.ok) {
        return { ...report, success: false, readyToOrder: false, error: pricing.error };
    }

    return {
        ...report,
        success: true,
        readyToOrder: true,
        message: `All order details are present. Order total: ${formatCurrency(pricing.total)}.`,
        orderSummary: {
            customerName: input.customerName ?? '',
            customerEmail: input.customerEmail ?? '',
            customerPhone: input.customerPhone ?? '',
            shippingAddress: input.shippingAddress ?? '',
            products: pricing.lines,
            totalCost: pricing.total,
        },
        nextStep: 'Show this summary to the customer and, once they confirm, call create_order with the same details.',
    };
}
