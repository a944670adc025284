/**
 * Data-access layer against in-memory SQLite
 */

import type { KyselyDB } from '../index.js';
import {
    createOrder,
    createReturn,
    createSupportTicket,
    findShippingRates,
    getCategories,
    getProductById,
    getProducts,
    listOrders,
    listReturns,
    listShippingRates,
    listSupportTickets,
    normalizeCategories,
    updateOrderStatus,
    updateReturnStatus,
    updateTicketStatus,
} from '../queries/index.js';
import { BusinessLogicError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { createSeededTestDb } from '../../__tests__/helpers/testDb.js';

const DAY_MS = 24 * 60 * 60 * 1000;

let db: KyselyDB;

beforeEach(async () => {
    db = await createSeededTestDb();
});

afterEach(async () => {
    await db.destroy();
});

async function stockOf(id: number): Promise<number | undefined> {
    return (await getProductById(db, id))?.stockQuantity;
}

/** Order #1: two backpacks and one bottle, $203.99 */
async function placeOrder() {
    return createOrder(db, {
        customerName: 'Sam Rivera',
        customerEmail: 'sam@example.com',
        shippingAddress: '1 Main St, Springfield',
        items: [
            { productId: 1, quantity: 2 },
            { productId: 2, quantity: 1 },
        ],
    });
}

describe('products', () => {
    it('filters by category case-insensitively, ordered by name', async () => {
        const products = await getProducts(db, { category: 'ACCESSORY' });
        expect(products.map(p => p.name)).toEqual(['Camp Stove', 'Insulated Bottle']);
    });

    it('searches name and description', async () => {
        expect((await getProducts(db, { search: 'DRINKS' })).map(p => p.name)).toEqual(['Insulated Bottle']);
        expect((await getProducts(db, { search: 'pack' })).map(p => p.name)).toEqual(['Trail Backpack']);
    });

    it('reads numeric columns back as numbers', async () => {
        const product = await getProductById(db, 1);
        expect(product).toMatchObject({ id: 1, name: 'Trail Backpack', price: 89.5, stockQuantity: 10 });
        expect(await getProductById(db, 99)).toBeUndefined();
    });

    it('lists distinct categories', async () => {
        expect(await getCategories(db)).toEqual(['Accessory', 'accessory', 'bag']);
    });

    it('renames categories and reports the distribution', async () => {
        const result = await normalizeCategories(db, { Accessory: 'accessory', Bags: 'bag' });

        expect(result.renamed).toEqual([
            { from: 'Accessory', to: 'accessory', updated: 1 },
            { from: 'Bags', to: 'bag', updated: 0 },
        ]);
        expect(result.distribution).toEqual([
            { category: 'accessory', count: 2 },
            { category: 'bag', count: 1 },
        ]);
    });
});

describe('orders', () => {
    it('creates an order at catalogue prices and takes the stock', async () => {
        const order = await placeOrder();

        expect(order.status).toBe('pending');
        expect(order.totalAmount).toBe(203.99);
        expect(order.customerPhone).toBeNull();
        expect(order.items).toMatchObject([
            { productId: 1, productName: 'Trail Backpack', quantity: 2, priceAtPurchase: 89.5 },
            { productId: 2, productName: 'Insulated Bottle', quantity: 1, priceAtPurchase: 24.99 },
        ]);
        expect(await stockOf(1)).toBe(8);
        expect(await stockOf(2)).toBe(2);
    });

    it('merges repeated products into one line', async () => {
        const order = await createOrder(db, {
            customerName: 'Sam Rivera',
            shippingAddress: '1 Main St',
            items: [
                { productId: 1, quantity: 1 },
                { productId: 1, quantity: 2 },
            ],
        });

        expect(order.items).toHaveLength(1);
        expect(order.items[0].quantity).toBe(3);
        expect(order.totalAmount).toBe(268.5);
    });

    it('rejects an order larger than the stock and writes nothing', async () => {
        const attempt = createOrder(db, {
            customerName: 'Sam Rivera',
            shippingAddress: '1 Main St',
            items: [{ productId: 2, quantity: 4 }],
        });

        await expect(attempt).rejects.toBeInstanceOf(BusinessLogicError);
        await expect(attempt).rejects.toThrow('Insufficient stock for Insulated Bottle: requested 4, available 3');
        expect(await listOrders(db)).toEqual([]);
        expect(await stockOf(2)).toBe(3);
    });

    it('rejects unknown products', async () => {
        await expect(createOrder(db, {
            customerName: 'Sam Rivera',
            shippingAddress: '1 Main St',
            items: [{ productId: 99, quantity: 1 }],
        })).rejects.toThrow('Product #99 not found');
    });

    it('rejects an order without items', async () => {
        const attempt = createOrder(db, { customerName: 'Sam Rivera', shippingAddress: '1 Main St', items: [] });
        await expect(attempt).rejects.toBeInstanceOf(ValidationError);
        await expect(attempt).rejects.toThrow('An order needs at least one product');
    });

    it('updates status and filters by it', async () => {
        const first = await placeOrder();
        const second = await placeOrder();

        const updated = await updateOrderStatus(db, first.id, 'shipped');
        expect(updated?.status).toBe('shipped');
        expect(await updateOrderStatus(db, 999, 'shipped')).toBeUndefined();

        expect((await listOrders(db, { status: 'pending' })).map(o => o.id)).toEqual([second.id]);
        expect((await listOrders(db)).map(o => o.id)).toEqual([second.id, first.id]);
    });
});

describe('support tickets', () => {
    it('opens a ticket', async () => {
        const ticket = await createSupportTicket(db, {
            customerName: 'Jo Park',
            issueDescription: 'Strap tore after a week',
            priority: 'high',
            productId: 1,
        });

        expect(ticket).toMatchObject({
            customerName: 'Jo Park',
            customerEmail: null,
            productId: 1,
            priority: 'high',
            status: 'open',
            assignedTo: null,
            resolvedAt: null,
        });
    });

    it('rejects a product that does not exist', async () => {
        const attempt = createSupportTicket(db, {
            customerName: 'Jo Park',
            issueDescription: 'Broken',
            priority: 'low',
            productId: 99,
        });
        await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
        await expect(attempt).rejects.toThrow('Product #99 not found');
    });

    it('stamps resolvedAt only when resolved', async () => {
        const a = await createSupportTicket(db, { customerName: 'A', issueDescription: 'x', priority: 'low' });
        const b = await createSupportTicket(db, { customerName: 'B', issueDescription: 'y', priority: 'urgent' });

        const resolved = await updateTicketStatus(db, a.id, 'resolved');
        const inProgress = await updateTicketStatus(db, b.id, 'in_progress');

        expect(resolved?.status).toBe('resolved');
        expect(resolved?.resolvedAt).toEqual(expect.any(String));
        expect(inProgress?.resolvedAt).toBeNull();
        expect((await listSupportTickets(db, { priority: 'urgent' })).map(t => t.id)).toEqual([b.id]);
    });
});

describe('returns', () => {
    it('returns one item of a multi-item order', async () => {
        const order = await placeOrder();

        const created = await createReturn(db, {
            orderId: order.id,
            reason: 'Changed my mind',
            lines: [{ productId: 2, quantity: 1 }],
        });

        expect(created.status).toBe('pending');
        expect(created.refundTotalAmount).toBe(24.99);
        expect(created.items).toHaveLength(1);
        expect(created.items[0]).toMatchObject({
            productId: 2,
            productName: 'Insulated Bottle',
            quantity: 1,
            priceAtPurchase: 24.99,
            refundAmount: 24.99,
        });
        expect(await listReturns(db, { orderId: order.id })).toHaveLength(1);
    });

    it('returns the whole order when no items are named', async () => {
        const order = await placeOrder();
        const created = await createReturn(db, { orderId: order.id, reason: 'Not needed' });

        expect(created.items.map(i => [i.productId, i.quantity])).toEqual([[1, 2], [2, 1]]);
        expect(created.refundTotalAmount).toBe(203.99);
    });

    it('leaves out quantities already returned', async () => {
        const order = await placeOrder();
        await createReturn(db, { orderId: order.id, reason: 'Leaks', lines: [{ productId: 2, quantity: 1 }] });

        const rest = await createReturn(db, { orderId: order.id, reason: 'Not needed' });
        expect(rest.items.map(i => [i.productId, i.quantity])).toEqual([[1, 2]]);
        expect(rest.refundTotalAmount).toBe(179);

        await expect(createReturn(db, { orderId: order.id, reason: 'Again' }))
            .rejects.toThrow(`Order #${order.id} has no items left to return`);
    });

    it('does not count rejected returns', async () => {
        const order = await placeOrder();
        const first = await createReturn(db, { orderId: order.id, reason: 'Leaks', lines: [{ productId: 2, quantity: 1 }] });

        await expect(createReturn(db, { orderId: order.id, reason: 'Leaks', lines: [{ productId: 2, quantity: 1 }] }))
            .rejects.toThrow(`Cannot return 1 x Insulated Bottle: only 0 left to return on order #${order.id}`);

        await updateReturnStatus(db, first.id, 'rejected');
        const second = await createReturn(db, { orderId: order.id, reason: 'Leaks', lines: [{ productId: 2, quantity: 1 }] });
        expect(second.refundTotalAmount).toBe(24.99);
    });

    it('rejects lines that are not on the order or exceed it', async () => {
        const order = await placeOrder();

        const tooMany = createReturn(db, { orderId: order.id, reason: 'x', lines: [{ productId: 1, quantity: 3 }] });
        await expect(tooMany).rejects.toBeInstanceOf(BusinessLogicError);
        await expect(tooMany).rejects.toThrow(`Cannot return 3 x Trail Backpack: only 2 left to return on order #${order.id}`);

        await expect(createReturn(db, { orderId: order.id, reason: 'x', lines: [{ productId: 3, quantity: 1 }] }))
            .rejects.toThrow(`Product #3 is not part of order #${order.id}`);
    });

    it('rejects an unknown order', async () => {
        const attempt = createReturn(db, { orderId: 999, reason: 'x' });
        await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
        await expect(attempt).rejects.toThrow('Order #999 not found');
    });

    it('stamps processedAt only when processed', async () => {
        const order = await placeOrder();
        const a = await createReturn(db, { orderId: order.id, reason: 'x', lines: [{ productId: 1, quantity: 1 }] });
        const b = await createReturn(db, { orderId: order.id, reason: 'y', lines: [{ productId: 2, quantity: 1 }] });

        expect((await updateReturnStatus(db, a.id, 'processed'))?.processedAt).toEqual(expect.any(String));
        expect((await updateReturnStatus(db, b.id, 'approved'))?.processedAt).toBeNull();
        expect(await updateReturnStatus(db, 999, 'approved')).toBeUndefined();
    });

    it('filters by age', async () => {
        const order = await placeOrder();
        await createReturn(db, { orderId: order.id, reason: 'x' });

        expect(await listReturns(db, { sinceDays: 1 })).toHaveLength(1);
        expect(await listReturns(db, { sinceDays: 1 }, new Date(Date.now() + 3 * DAY_MS))).toEqual([]);
    });
});

describe('shipping rates', () => {
    it('prefers rates for the exact ZIP code', async () => {
        expect((await findShippingRates(db, '10001')).map(r => r.carrier)).toEqual(['USPS']);
        expect((await findShippingRates(db, ' 10001 ')).map(r => r.carrier)).toEqual(['USPS']);
    });

    it('falls back to the catch-all rates', async () => {
        expect((await findShippingRates(db, '60601')).map(r => r.carrier)).toEqual(['UPS', 'FedEx']);
        expect((await findShippingRates(db, '10001', 'express')).map(r => r.carrier)).toEqual(['FedEx']);
        expect(await findShippingRates(db, '60601', 'overnight')).toEqual([]);
    });

    it('lists rates cheapest first, filtered by carrier', async () => {
        expect((await listShippingRates(db)).map(r => r.carrier)).toEqual(['USPS', 'UPS', 'FedEx']);
        expect((await listShippingRates(db, { carrier: 'ups' })).map(r => r.baseRate)).toEqual([7.49]);
    });
});
