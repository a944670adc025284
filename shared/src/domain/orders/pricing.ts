/**
 * Order Pricing
 *
 * Pure functions that turn requested (productId, quantity) pairs into priced
 * lines against a catalogue snapshot. Used by the draft-order preview and by
 * order creation so both apply the same stock and price rules.
 */

import type { Product } from '../../types/index.js';
import { round2 } from '../formatting.js';

// ============================================
// TYPES
// ============================================

export interface OrderLineRequest {
    productId: number;
    quantity: number;
}

/** The catalogue fields pricing needs */
export type CatalogEntry = Pick<Product, 'id' | 'name' | 'price' | 'stockQuantity'>;

export type Catalog = ReadonlyMap<number, CatalogEntry>;

export interface PricedLine {
    productId: number;
    name: string;
    quantity: number;
    unitPrice: number;
    lineTotal: number;
}

export type PricingResult =
    | { ok: true; lines: PricedLine[]; total: number }
    | { ok: false; error: string };

// ============================================
// HELPERS
// ============================================

/**
 * Pair product ids with quantities.
 * Returns null when the two lists differ in length.
 */
export function zipOrderLines(
    productIds: readonly number[],
    quantities: readonly number[]
): OrderLineRequest[] | null {
    if (productIds.length !== quantities.length) return null;
    return productIds.map((productId, i) => ({ productId, quantity: quantities[i] }));
}

/** Merge repeated product ids into one line, keeping first-seen order */
export function mergeOrderLines(lines: readonly OrderLineRequest[]): OrderLineRequest[] {
    const merged = new Map<number, number>();
    for (const line of lines) {
        merged.set(line.productId, (merged.get(line.productId) ?? 0) + line.quantity);
    }
    return [...merged].map(([productId, quantity]) => ({ productId, quantity }));
}

export function isPositiveWholeNumber(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

/**
 * Sum of quantity x price, rounded to cents
 *
 * @example
 * calculateOrderTotal([{ quantity: 2, priceAtPurchase: 19.99 }]) // 39.98
 */
export function calculateOrderTotal(
    items: ReadonlyArray<{ quantity: number; priceAtPurchase: number }>
): number {
    return round2(items.reduce((sum, item) => sum + item.quantity * item.priceAtPurchase, 0));
}

// ============================================
// MAIN FUNCTION
// ============================================

/**
 * Price requested lines against the catalogue.
 *
 * Fails on the first unknown product or the first line whose quantity exceeds
 * the product's stock. Repeated product ids are merged before the stock check.
 */
export function priceOrderLines(requests: readonly OrderLineRequest[], catalog: Catalog): PricingResult {
    const lines: PricedLine[] = [];

    for (const request of mergeOrderLines(requests)) {
        if (!isPositiveWholeNumber(request.quantity)) {
            return { ok: false, error: `Quantity for product #${request.productId} must be a positive whole number` };
        }

        const product = catalog.get(request.productId);
        if (!product) {
            return { ok: false, error: `Product #${request.productId} not found` };
        }

        if (product.stockQuantity < request.quantity) {
            return {
                ok: false,
                error: `Insufficient stock for ${product.name}: requested ${request.quantity}, available ${product.stockQuantity}`,
            };
        }

        lines.push({
            productId: product.id,
            name: product.name,
            quantity: request.quantity,
            unitPrice: product.price,
            lineTotal: round2(product.price * request.quantity),
        });
    }

    const total = calculateOrderTotal(lines.map(l => ({ quantity: l.quantity, priceAtPurchase: l.unitPrice })));
    return { ok: true, lines, total };
}
