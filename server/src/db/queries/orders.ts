/**
 * Order Queries
 *
 * Order creation runs pricing and the stock decrement in one transaction.
 * Pricing rules live in @supportdesk/shared so the draft preview and the real
 * order agree.
 */

import {
    INITIAL_ORDER_STATUS,
    mergeOrderLines,
    priceOrderLines,
    type Order,
    type OrderItem,
    type OrderLineRequest,
    type OrderStatus,
    type OrderWithItems,
} from '@supportdesk/shared';
import type { KyselyDB } from '../index.js';
import { BusinessLogicError, ValidationError } from '../../utils/errors.js';
import { getCatalog } from './products.js';
import { nowIso, toNumber, toOrder } from './rowMappers.js';

// ============================================
// INPUT TYPES
// ============================================

export interface CreateOrderInput {
    customerName: string;
    customerEmail?: string | null;
    customerPhone?: string | null;
    shippingAddress: string;
    items: OrderLineRequest[];
}

export interface OrderListParams {
    status?: OrderStatus;
}

// ============================================
// WRITES
// ============================================

/**
 * Create an order with its items and take the stock.
 *
 * @throws ValidationError when no items are given
 * @throws BusinessLogicError for unknown products or insufficient stock
 */
export async function createOrder(db: KyselyDB, input: CreateOrderInput): Promise<OrderWithItems> {
    if (input.items.length === 0) {
        throw new ValidationError('An order needs at least one product');
    }

    return db.transaction().execute(async (trx) => {
        const requested = mergeOrderLines(input.items);
        const catalog = await getCatalog(trx, requested.map(l => l.productId));
        const pricing = priceOrderLines(requested, catalog);
        if (!pricing.ok) {
            throw new BusinessLogicError(pricing.error, 'order_pricing');
        }

        const now = nowIso();
        const order = await trx
            .insertInto('Order')
            .values({
                customerName: input.customerName,
                customerEmail: input.customerEmail ?? null,
                customerPhone: input.customerPhone ?? null,
                shippingAddress: input.shippingAddress,
                totalAmount: pricing.total,
                status: INITIAL_ORDER_STATUS,
                createdAt: now,
                updatedAt: now,
            })
            .returning('id')
            .executeTakeFirstOrThrow();

        await trx
            .insertInto('OrderItem')
            .values(pricing.lines.map(line => ({
                orderId: order.id,
                productId: line.productId,
                quantity: line.quantity,
                priceAtPurchase: line.unitPrice,
            })))
            .execute();

        for (const line of pricing.lines) {
            // Guarded decrement: a concurrent order may have taken the stock since the read
            const result = await trx
                .updateTable('Product')
                .set(eb => ({ stockQuantity: eb('stockQuantity', '-', line.quantity) }))
                .where('id', '=', line.productId)
                .where('stockQuantity', '>=', line.quantity)
                .executeTakeFirst();

            if (toNumber(result.numUpdatedRows) === 0) {
                throw new BusinessLogicError(`Insufficient stock for ${line.name}`, 'order_stock');
            }
        }

        const created = await getOrder(trx, order.id);
        if (!created) {
            throw new BusinessLogicError(`Order #${order.id} could not be read back`);
        }
        return created;
    });
}

export async function updateOrderStatus(db: KyselyDB, id: number, status: OrderStatus): Promise<Order | undefined> {
    const row = await db
        .updateTable('Order')
        .set({ status, updatedAt: nowIso() })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
    return row ? toOrder(row) : undefined;
}

// ============================================
// READS
// ============================================

export async function getOrderItems(db: KyselyDB, orderId: number): Promise<OrderItem[]> {
    const rows = await db
        .selectFrom('OrderItem')
        .innerJoin('Product', 'Product.id', 'OrderItem.productId')
        .select([
            'OrderItem.id',
            'OrderItem.orderId',
            'OrderItem.productId',
            'OrderItem.quantity',
            'OrderItem.priceAtPurchase',
            'Product.name as productName',
        ])
        .where('OrderItem.orderId', '=', orderId)
        .orderBy('OrderItem.id')
        .execute();

    return rows.map(r => ({
        id: r.id,
        orderId: r.orderId,
        productId: r.productId,
        productName: r.productName,
        quantity: r.quantity,
        priceAtPurchase: toNumber(r.priceAtPurchase),
    }));
}

/** Order with its items and product names */
export async function getOrder(db: KyselyDB, id: number): Promise<OrderWithItems | undefined> {
    const row = await db.selectFrom('Order').selectAll().where('id', '=', id).executeTakeFirst();
    if (!row) return undefined;

    const items = await getOrderItems(db, id);
    return { ...toOrder(row), items };
}

/** Newest first */
export async function listOrders(db: KyselyDB, params: OrderListParams = {}): Promise<Order[]> {
    let query = db.selectFrom('Order').selectAll();
    if (params.status) {
        query = query.where('status', '=', params.status);
    }
    const rows = await query.orderBy('createdAt', 'desc').orderBy('id', 'desc').execute();
    return rows.map(toOrder);
}
