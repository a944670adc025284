/**
 * Return Line Resolution
 *
 * Pure functions deciding which order lines a return covers and what each
 * line refunds. No side effects, no database calls - just logic.
 */

import { round2 } from '../formatting.js';
import { isPositiveWholeNumber, mergeOrderLines } from '../orders/pricing.js';

// ============================================
// TYPES
// ============================================

/** One product on an order, with how much of it has been returned already */
export interface ReturnableLine {
    productId: number;
    productName: string;
    orderedQuantity: number;
    returnedQuantity: number;
    priceAtPurchase: number;
}

export interface ReturnLineRequest {
    productId: number;
    quantity: number;
}

export interface ResolvedReturnLine {
    productId: number;
    productName: string;
    quantity: number;
    priceAtPurchase: number;
    refundAmount: number;
}

export type ReturnResolution =
    | { ok: true; lines: ResolvedReturnLine[]; refundTotal: number }
    | { ok: false; error: string };

// ============================================
// HELPERS
// ============================================

/**
 * Build the requested lines from the tool arguments.
 *
 * - no product ids: `undefined`, meaning the whole order
 * - product ids without quantities: one unit of each
 * - otherwise the lists must match in length (null when they don't)
 */
export function toReturnLineRequests(
    productIds?: readonly number[],
    quantities?: readonly number[]
): ReturnLineRequest[] | undefined | null {
    if (!productIds || productIds.length === 0) return undefined;
    if (!quantities || quantities.length === 0) {
        return productIds.map(productId => ({ productId, quantity: 1 }));
    }
    if (productIds.length !== quantities.length) return null;
    return productIds.map((productId, i) => ({ productId, quantity: quantities[i] }));
}

export function remainingQuantity(line: ReturnableLine): number {
    return Math.max(0, line.orderedQuantity - line.returnedQuantity);
}

export function calculateRefundTotal(
    lines: ReadonlyArray<{ quantity: number; priceAtPurchase: number }>
): number {
    return round2(lines.reduce((sum, l) => sum + l.quantity * l.priceAtPurchase, 0));
}

function toResolvedLine(line: ReturnableLine, quantity: number): ResolvedReturnLine {
    return {
        productId: line.productId,
        productName: line.productName,
        quantity,
        priceAtPurchase: line.priceAtPurchase,
        refundAmount: round2(line.priceAtPurchase * quantity),
    };
}

// ============================================
// MAIN FUNCTION
// ============================================

/**
 * Resolve the lines of a return against the order's lines.
 *
 * @param orderId - Used in error messages only
 * @param orderLines - The order's lines with already-returned quantities
 * @param requested - Specific lines, or undefined to return everything still returnable
 */
export function resolveReturnLines(
    orderId: number,
    orderLines: readonly ReturnableLine[],
    requested?: readonly ReturnLineRequest[]
): ReturnResolution {
    let lines: ResolvedReturnLine[];

    if (!requested) {
        lines = orderLines
            .filter(line => remainingQuantity(line) > 0)
            .map(line => toResolvedLine(line, remainingQuantity(line)));
    } else {
        const byProduct = new Map(orderLines.map(line => [line.productId, line]));
        lines = [];

        for (const request of mergeOrderLines(requested)) {
            if (!isPositiveWholeNumber(request.quantity)) {
                return { ok: false, error: `Return quantity for product #${request.productId} must be a positive whole number` };
            }

            const line = byProduct.get(request.productId);
            if (!line) {
                return { ok: false, error: `Product #${request.productId} is not part of order #${orderId}` };
            }

            const remaining = remainingQuantity(line);
            if (request.quantity > remaining) {
                return {
                    ok: false,
                    error: `Cannot return ${request.quantity} x ${line.productName}: only ${remaining} left to return on order #${orderId}`,
                };
            }

            lines.push(toResolvedLine(line, request.quantity));
        }
    }

    if (lines.length === 0) {
        return { ok: false, error: `Order #${orderId} has no items left to return` };
    }

    return { ok: true, lines, refundTotal: calculateRefundTotal(lines) };
}
