/**
 * Unit tests for draft order validation
 */

import { evaluateDraftOrder, reportDraftFields, type Catalog } from '../index.js';

const catalog: Catalog = new Map([
    [1, { id: 1, name: 'Trail Backpack', price: 89.5, stockQuantity: 10 }],
    [2, { id: 2, name: 'Insulated Bottle', price: 24.99, stockQuantity: 3 }],
    [3, { id: 3, name: 'Touring Canoe', price: 649, stockQuantity: 4 }],
]);

const customer = {
    customerName: 'Sam Rivera',
    customerEmail: 'sam@example.com',
    customerPhone: '555-0100',
    shippingAddress: '12 Elm St, Springfield, IL 62701',
};

describe('draftOrder', () => {
    describe('reportDraftFields', () => {
        it('lists every field as missing for an empty draft', () => {
            expect(reportDraftFields({})).toEqual({
                providedFields: [],
                missingFields: [
                    'customerName',
                    'customerEmail',
                    'customerPhone',
                    'shippingAddress',
                    'productIds',
                    'quantities',
                ],
            });
        });

        it('treats blank strings and empty lists as missing', () => {
            const report = reportDraftFields({ customerName: '   ', productIds: [], shippingAddress: '1 Main St' });
            expect(report.providedFields).toEqual(['shippingAddress']);
            expect(report.missingFields).toContain('customerName');
            expect(report.missingFields).toContain('productIds');
        });
    });

    describe('evaluateDraftOrder', () => {
        it('asks for everything when nothing is provided', () => {
            const result = evaluateDraftOrder({}, new Map());
            expect(result.success).toBe(true);
            expect(result.readyToOrder).toBe(false);
            if (result.success && !result.readyToOrder) {
                expect(result.message).toBe(
                    'Still needed to place the order: full name, email address, phone number, shipping address, products and quantities.'
                );
            }
        });

        it('reports partial information', () => {
            const result = evaluateDraftOrder(
                { customerName: 'Sam Rivera', shippingAddress: '12 Elm St, Springfield, IL 62701' },
                new Map()
            );
            expect(result.success).toBe(true);
            expect(result.readyToOrder).toBe(false);
            expect(result.providedFields).toEqual(['customerName', 'shippingAddress']);
            expect(result.missingFields).toEqual(['customerEmail', 'customerPhone', 'productIds', 'quantities']);
        });

        it('is not ready when products are missing', () => {
            const result = evaluateDraftOrder(customer, catalog);
            expect(result.readyToOrder).toBe(false);
            expect(result.missingFields).toEqual(['productIds', 'quantities']);
        });

        it('prices a complete draft with sufficient stock', () => {
            const result = evaluateDraftOrder({ ...customer, productIds: [1, 2], quantities: [2, 3] }, catalog);

            expect(result.success).toBe(true);
            expect(result.readyToOrder).toBe(true);
            if (!result.readyToOrder || !result.success) return;

            expect(result.missingFields).toEqual([]);
            expect(result.orderSummary.products).toEqual([
                { productId: 1, name: 'Trail Backpack', quantity: 2, unitPrice: 89.5, lineTotal: 179 },
                { productId: 2, name: 'Insulated Bottle', quantity: 3, unitPrice: 24.99, lineTotal: 74.97 },
            ]);
            expect(result.orderSummary.totalCost).toBe(253.97);
            expect(result.orderSummary.customerEmail).toBe('sam@example.com');
            expect(result.message).toBe('All order details are present. Order total: $253.97.');
        });

        it('formats the total with thousands separators', () => {
            const result = evaluateDraftOrder({ ...customer, productIds: [3], quantities: [2] }, catalog);

            expect(result.readyToOrder).toBe(true);
            if (!result.readyToOrder || !result.success) return;
            expect(result.orderSummary.totalCost).toBe(1298);
            expect(result.message).toBe('All order details are present. Order total: $1,298.00.');
        });

        it('fails on an unknown product', () => {
            const result = evaluateDraftOrder({ ...customer, productIds: [99999], quantities: [1] }, catalog);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('Product #99999 not found');
            }
        });

        it('fails when stock is insufficient', () => {
            const result = evaluateDraftOrder({ ...customer, productIds: [2], quantities: [4] }, catalog);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('Insufficient stock for Insulated Bottle: requested 4, available 3');
            }
        });

        it('fails when product ids and quantities differ in length', () => {
            const result = evaluateDraftOrder({ productIds: [1, 2], quantities: [1] }, catalog);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('Product IDs and quantities must have the same length');
            }
        });

        it('fails on a zero quantity even before the draft is complete', () => {
            const result = evaluateDraftOrder({ productIds: [1], quantities: [0] }, catalog);
            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error).toBe('Quantities must be positive whole numbers');
            }
        });
    });
});
